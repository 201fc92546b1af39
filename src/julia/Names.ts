/**
 * Buffer names derived from node ids
 */

import { NodeId } from '../graph/Node.js';

export type BufferPrefix = 'cache' | 'const';

/**
 * Long-form name for the buffer holding a node's value, e.g. cache_00012
 */
export function bufferName(id: NodeId, prefix: BufferPrefix): string {
  return `${prefix}_${String(id).padStart(5, '0')}`;
}

/**
 * Matches every long-form buffer name in a piece of code
 */
export const BUFFER_NAME_PATTERN = /\b(?:cache|const)_\d{5,}\b/g;

function namePattern(name: string): RegExp {
  return new RegExp(`\\b${name}\\b`, 'g');
}

export function referencesBuffer(code: string, name: string): boolean {
  return namePattern(name).test(code);
}

export function replaceBuffer(code: string, name: string, replacement: string): string {
  return code.replace(namePattern(name), () => replacement);
}

/**
 * Rename every long-form buffer name found in renames; others stay as they are
 */
export function renameBuffers(code: string, renames: ReadonlyMap<string, string>): string {
  return code.replace(BUFFER_NAME_PATTERN, name => renames.get(name) ?? name);
}
