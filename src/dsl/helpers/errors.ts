/**
 * Errors raised while building or loading conditions.
 *
 * Evaluation itself never throws, so every error a caller can see before
 * evaluating comes from here:
 *
 * - {@link DslValidationError}: a builder was used wrongly (`field('')`,
 *   `any()` without children, `chain().or()` before any condition)
 * - {@link YamlValidationError}: a parsed document has the wrong shape; `path`
 *   points into the document (`condition.children[1].operator`)
 * - {@link YamlLoadError}: the text could not be read or parsed; `filePath`
 *   is set when it came from a file
 *
 * ```typescript
 * try {
 *   engine.evaluateEither(await loadConditionFromFile(file), data);
 * } catch (err) {
 *   if (err instanceof DslError) {
 *     // the condition never reached the engine
 *   }
 * }
 * ```
 */

/** Common base of all builder and loader errors. */
export class DslError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DslError';
  }
}

/** Invalid input to a builder, or `build()` on an incomplete builder. */
export class DslValidationError extends DslError {
  constructor(message: string) {
    super(message);
    this.name = 'DslValidationError';
  }
}

/** Structural error in a condition or data document. */
export class YamlValidationError extends DslError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${path}: ${message}`);
    this.name = 'YamlValidationError';
    this.path = path;
  }
}

/** Unreadable, empty or syntactically invalid condition or data text. */
export class YamlLoadError extends DslError {
  readonly filePath: string | undefined;

  constructor(message: string, filePath?: string) {
    super(filePath ? `${filePath}: ${message}` : message);
    this.name = 'YamlLoadError';
    this.filePath = filePath;
  }
}
