/**
 * A structured command ready for execution.
 * Subsystem adapters never build shell strings; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
  readonly stdin?: string;
}
