/**
 * A structured command ready for execution.
 * Backends never build shell strings; they produce Command objects.
 */
export interface Command {
  readonly argv: string[];
  readonly env?: Record<string, string>;
}

/**
 * Render a command for logs and dry-run output. Environment overrides are shown
 * as leading assignments; PATH is left out since every pacman call carries one.
 */
export function formatCommand(command: Command): string {
  const assignments = Object.entries(command.env ?? {})
    .filter(([key]) => key !== "PATH")
    .map(([key, value]) => `${key}=${value}`);
  return [...assignments, ...command.argv].join(" ");
}
