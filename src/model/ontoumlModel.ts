/**
 * OntoUML class diagram document (v1).
 *
 * Source of truth: src/model/schema/ontouml-model-v1.json
 */

export type ModelSchemaVersion = '1.0';

export type ElementId = string;

export type Navigability = 'unspecified' | 'navigable' | 'nonNavigable';

export type Aggregation = 'none' | 'shared' | 'composite';

export type PackageElement = {
  type: 'package';
  id: ElementId;
  name: string;
  elements: ModelElement[];
};

export type ClassElement = {
  type: 'class';
  id: ElementId;
  name: string;
  /** OntoUML stereotype literal (e.g. `kind`). Unknown text is reported, not rejected. */
  stereotype: string;
  isAbstract?: boolean;
  /** Newline-separated attribute lines, optionally prefixed with `+ - # ~`. */
  properties?: string;
  functions?: string;
};

export type InstanceElement = {
  type: 'instance';
  id: ElementId;
  name: string;
  instanceType?: string;
  slots?: string;
};

export type GeneralizationElement = {
  type: 'generalization';
  id: ElementId;
  /** Specific (child) classes. */
  sources: ElementId[];
  /** General (parent) classes. */
  targets: ElementId[];
  setName?: string;
  isDisjoint?: boolean;
  isCovering?: boolean;
};

export type AssociationEnd = {
  /** Class or instance id. */
  element: ElementId;
  multiplicity?: string;
  role?: string;
  reading?: string;
  navigability?: Navigability;
  aggregation?: Aggregation;
};

export type AssociationElement = {
  type: 'association';
  id: ElementId;
  /** Association stereotype literal; `""` is a plain association. */
  stereotype: string;
  source: AssociationEnd;
  target: AssociationEnd;
};

export type DependencyElement = {
  type: 'dependency';
  id: ElementId;
  stereotype?: string;
  source: ElementId;
  target: ElementId;
};

export type CommentElement = {
  type: 'comment';
  id: ElementId;
  text: string;
};

export type CommentLinkElement = {
  type: 'commentLink';
  id: ElementId;
  source: ElementId;
  target: ElementId;
};

export type ModelElement =
  | PackageElement
  | ClassElement
  | InstanceElement
  | GeneralizationElement
  | AssociationElement
  | DependencyElement
  | CommentElement
  | CommentLinkElement;

export type ModelElementType = ModelElement['type'];

export type OntoUmlModel = {
  schemaVersion: ModelSchemaVersion;
  id: ElementId;
  name: string;
  elements: ModelElement[];
};

export function createEmptyModel(id = 'diagram', name = 'Diagram'): OntoUmlModel {
  return {
    schemaVersion: '1.0',
    id,
    name,
    elements: [],
  };
}
