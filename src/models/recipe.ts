/** Recipe data model: requirements, design and component metadata as parsed from a recipe directory. */

export type Priority = 'MUST' | 'SHOULD' | 'COULD';

export const PRIORITIES: readonly Priority[] = ['MUST', 'SHOULD', 'COULD'];

export type ComponentType = 'service' | 'agent' | 'library' | 'tool' | 'core';

export interface Requirement {
  id: string;
  description: string;
  priority: Priority;
  /** Functional or non-functional section the requirement came from. */
  category: 'functional' | 'non-functional';
  validationCriteria: string[];
  /** Set by the compliance phase. */
  implemented: boolean;
}

export interface RequirementSet {
  title: string;
  purpose: string;
  requirements: Requirement[];
  successCriteria: string[];
}

export interface ComponentDesign {
  name: string;
  responsibility: string;
  signatures: string[];
}

export interface InterfaceDescriptor {
  name: string;
  description: string;
}

export interface Design {
  architectureSummary: string;
  components: ComponentDesign[];
  interfaces: InterfaceDescriptor[];
}

export interface ComponentMetadata {
  name: string;
  version: string;
  type: ComponentType;
  description: string;
  /** Build-order dependencies, by recipe name. */
  dependencies: string[];
  attributes: Record<string, unknown>;
}

export interface RecipeSources {
  requirements: string;
  design: string;
  metadata: string;
}

export interface Recipe {
  name: string;
  /** Directory the recipe was loaded from, or a synthetic handle for derived recipes. */
  location: string;
  requirements: RequirementSet;
  design: Design;
  metadata: ComponentMetadata;
  sources: RecipeSources;
  contentChecksum: string;
}

/** True when the recipe only aggregates child recipes and has no generation step of its own. */
export function isAggregate(recipe: Recipe): boolean {
  return recipe.metadata.attributes.aggregate === true;
}

export function isSelfHosting(recipe: Recipe): boolean {
  return recipe.metadata.attributes.selfHosting === true;
}

export function mustRequirements(recipe: Recipe): Requirement[] {
  return recipe.requirements.requirements.filter((r) => r.priority === 'MUST');
}
