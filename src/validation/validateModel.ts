import type { OntoUmlModel } from '../model/ontoumlModel';
import { buildModelIndex, type ModelIndex } from '../model/modelIndex';
import { buildModelGraph } from './graph';
import { validateStructure } from './structural';
import { detectAntiPatterns } from './antipatterns';
import type { ValidationProblem } from './problems';

export type ValidationOptions = {
  /** Run the structural (well-formedness) checks. */
  checkErrors?: boolean;
  /** Run the anti-pattern detectors. */
  checkAntipatterns?: boolean;
};

export const DEFAULT_VALIDATION_OPTIONS: Required<ValidationOptions> = {
  checkErrors: true,
  checkAntipatterns: false,
};

/**
 * Validate an indexed diagram. Errors come first, then anti-patterns; each
 * group is in traversal order. Every call recomputes from scratch.
 */
export function validateModelIndex(index: ModelIndex, options: ValidationOptions = {}): ValidationProblem[] {
  const checkErrors = options.checkErrors ?? DEFAULT_VALIDATION_OPTIONS.checkErrors;
  const checkAntipatterns = options.checkAntipatterns ?? DEFAULT_VALIDATION_OPTIONS.checkAntipatterns;
  const graph = buildModelGraph(index);
  const problems: ValidationProblem[] = [];
  if (checkErrors) problems.push(...validateStructure(graph));
  if (checkAntipatterns) problems.push(...detectAntiPatterns(graph));
  return problems;
}

export function validateModel(model: OntoUmlModel, options: ValidationOptions = {}): ValidationProblem[] {
  return validateModelIndex(buildModelIndex(model), options);
}
