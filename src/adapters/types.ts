/**
 * Output format adapter contract.
 *
 * An adapter pairs template sources with the escaping rules of one output
 * dialect. The engine is the same for every adapter; adding a dialect means
 * writing its templates and registering an adapter, nothing else.
 */

export interface FormatAdapter {
  /** Format name used on the command line and in configuration. */
  readonly format: string;
  /** Human-readable name. */
  readonly label: string;
  /** Template rendering a whole content plan. */
  readonly documentTemplate: string;
  /** Template rendering a single section (bound as `section`). */
  readonly sectionTemplate: string;
  /** Extension of generated files, including the dot. */
  readonly fileExtension: string;
  /** Escapes interpolated values for this dialect. */
  escape(text: string): string;
}
