/**
 * A structured external-tool invocation.
 * Stages never build raw shell strings; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly cwd?: string;
}
