/**
 * Known-Shape Service
 *
 * Consults the registered detectors for a node and reports the first match,
 * skipping shapes the configuration has switched off.
 *
 * @module
 */

import type {
  IKnownShapeDetector,
  IKnownShapeService,
  KnownShapeContext,
  KnownShapeMatch,
  KnownShapeName,
  SuppressibleShape,
} from "./interfaces.js";
import { createAllDetectors } from "./detectors/index.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("known-shapes");

export interface KnownShapeServiceOptions {
  suppress?: readonly SuppressibleShape[];
  detectors?: IKnownShapeDetector[];
}

export class KnownShapeService implements IKnownShapeService {
  private detectors: Map<KnownShapeName, IKnownShapeDetector> = new Map();
  private readonly suppressed: ReadonlySet<KnownShapeName>;

  constructor(options: KnownShapeServiceOptions = {}) {
    this.suppressed = new Set(options.suppress ?? []);
    for (const detector of options.detectors ?? createAllDetectors()) {
      this.registerDetector(detector);
    }
  }

  /**
   * Register a detector. A later detector for the same shape replaces the
   * earlier one.
   */
  registerDetector(detector: IKnownShapeDetector): void {
    this.detectors.set(detector.shape, detector);
    logger.debug({ shape: detector.shape }, "Registered known-shape detector");
  }

  getDetectors(): IKnownShapeDetector[] {
    return Array.from(this.detectors.values());
  }

  isSuppressed(shape: KnownShapeName): boolean {
    return this.suppressed.has(shape);
  }

  detect(context: KnownShapeContext): KnownShapeMatch | null {
    for (const detector of this.detectors.values()) {
      if (this.isSuppressed(detector.shape)) continue;
      const match = detector.detect(context);
      if (match) {
        logger.debug(
          { shape: match.shape, property: context.propertyName, reason: match.reason },
          "Known shape matched"
        );
        return match;
      }
    }
    return null;
  }
}

export function createKnownShapeService(options?: KnownShapeServiceOptions): KnownShapeService {
  return new KnownShapeService(options);
}
