/**
 * Test helpers for inspecting generated Julia code
 */

/**
 * Statements between the function signature and the closing `nothing`,
 * without indentation
 *
 * @example
 * functionBody(code) // ['@. dy = y[1]']
 */
export function functionBody(code: string): string[] {
  const lines = code.split('\n');
  const start = lines.findIndex(line => line.startsWith('function '));
  const end = lines.indexOf('   nothing');
  if (start < 0 || end < start) {
    throw new Error(`Not a generated function:\n${code}`);
  }
  return lines
    .slice(start + 1, end)
    .map(line => line.trim());
}

/**
 * Field declarations of the captured `cs` tuple
 */
export function preamble(code: string): string[] {
  const lines = code.split('\n');
  const open = lines.findIndex(line => line.endsWith('cs = ('));
  if (open < 0) {
    return [];
  }
  const close = lines.indexOf(')', open);
  return lines.slice(open + 1, close).map(line => line.trim().replace(/,$/, ''));
}

/**
 * Split `lhs = rhs` / `lhs .= rhs` at the first assignment operator
 */
export function splitAssignment(statement: string): { lhs: string; rhs: string } | undefined {
  const match = /^(.*?)\s\.?=\s(.*)$/.exec(statement);
  return match ? { lhs: match[1], rhs: match[2] } : undefined;
}
