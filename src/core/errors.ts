/**
 * Error types for analysis and conversion.
 *
 * Analysis errors abort graph construction for the whole patch. Conversion
 * errors are raised only by converters for objects they recognize but cannot
 * default; unrecognized objects degrade to a placeholder instead.
 */

export type AnalysisErrorCode =
  | "INVALID_ROUTING"
  | "CIRCULAR_DEPENDENCY"
  | "UNSUPPORTED_SPATIAL";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string) {
    super(message);
    this.name = "AnalysisError";
    this.code = code;
  }

  static invalidRouting(detail: string): AnalysisError {
    return new AnalysisError("INVALID_ROUTING", `Invalid routing configuration: ${detail}`);
  }

  /** Reserved for cycle detection; nothing raises it yet. */
  static circularDependency(): AnalysisError {
    return new AnalysisError("CIRCULAR_DEPENDENCY", "Circular dependency detected");
  }

  static unsupportedSpatial(detail: string): AnalysisError {
    return new AnalysisError("UNSUPPORTED_SPATIAL", `Unsupported spatial configuration: ${detail}`);
  }
}

export type ConversionErrorCode =
  | "UNSUPPORTED_OBJECT"
  | "INVALID_PARAMETER"
  | "MISSING_ATTRIBUTE";

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = "ConversionError";
    this.code = code;
  }

  static unsupportedObject(name: string): ConversionError {
    return new ConversionError("UNSUPPORTED_OBJECT", `Unsupported object type: ${name}`);
  }

  static invalidParameter(name: string, value: number): ConversionError {
    return new ConversionError("INVALID_PARAMETER", `Invalid parameter range: ${name} = ${value}`);
  }

  static missingAttribute(name: string): ConversionError {
    return new ConversionError("MISSING_ATTRIBUTE", `Missing required attribute: ${name}`);
  }
}
