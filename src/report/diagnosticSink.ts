import crypto from 'node:crypto';
import type { ElementId } from '../model/ontoumlModel';
import { elementLabel, type ModelIndex } from '../model/modelIndex';
import type { ValidationProblem } from '../validation/problems';

/*
 * What the hosting editor does with a validation result: highlight the
 * offending elements and show one clickable row per problem.
 */

export type HighlightLevel = 'invalid' | 'warning';

export type HighlightCommand =
  | { type: 'clearHighlight' }
  | { type: 'highlight'; elementId: ElementId; level: HighlightLevel };

export type SelectAndPanCommand = {
  type: 'selectAndPan';
  elementId: ElementId;
};

/** `row:` plus the first 16 hex digits of the SHA-1 of `value`. */
function rowKey(value: string): string {
  return `row:${crypto.createHash('sha1').update(value, 'utf8').digest('hex').slice(0, 16)}`;
}

export type ResultRow = {
  /** Stable per run: derived from the position, code and element. */
  key: string;
  category: 'Error' | 'Anti-Pattern';
  elementId: ElementId;
  label: string;
  text: string;
};

/**
 * Clears previous highlighting, then one highlight per problem. An element
 * with several problems is highlighted once per problem.
 */
export function toHighlightCommands(problems: readonly ValidationProblem[]): HighlightCommand[] {
  return [
    { type: 'clearHighlight' },
    ...problems.map(
      (p): HighlightCommand => ({
        type: 'highlight',
        elementId: p.elementId,
        level: p.type === 'error' ? 'invalid' : 'warning',
      }),
    ),
  ];
}

export function toResultRows(problems: readonly ValidationProblem[], index: ModelIndex): ResultRow[] {
  return problems.map((p, i) => ({
    key: rowKey(`${i}:${p.type}:${p.kind}:${p.elementId}`),
    category: p.type === 'error' ? 'Error' : 'Anti-Pattern',
    elementId: p.elementId,
    label: elementLabel(index, p.elementId),
    text: p.type === 'error' ? p.message : p.kind,
  }));
}

/** Clicking a row's label selects the element and pans the view to it. */
export function rowActivation(row: ResultRow): SelectAndPanCommand {
  return { type: 'selectAndPan', elementId: row.elementId };
}

/** Text shown in place of the table when a run finds nothing. */
export const NO_PROBLEMS_TEXT = 'No problems found';
