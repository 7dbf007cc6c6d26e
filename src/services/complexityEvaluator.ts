/** Scores recipe complexity and splits over-threshold recipes into child recipes plus an aggregate. */

import type { ComponentDesign, Design, Recipe, Requirement } from '../models/recipe.js';
import type { BuildLogger } from '../utils/buildLogger.js';
import type { ComplexityConfig } from '../utils/config.js';
import { ComplexityExceededError, ValidationError } from '../utils/errors.js';
import { computeChecksum, renderDesign, renderMetadata, renderRequirements, type RecipeStore } from './recipeStore.js';

/** Keyword families used to detect distinct functional areas in a design's components. */
const FUNCTIONAL_AREAS: Record<string, RegExp> = {
  storage: /\b(database|storage|persist\w*|repository|cache|schema)\b/,
  api: /\b(api|endpoint|http|rest|route|rpc)\b/,
  presentation: /\b(ui|view|render\w*|frontend|page|dashboard|display)\b/,
  auth: /\b(auth\w*|login|permission|credential|token)\b/,
  messaging: /\b(queue|publish\w*|subscri\w*|broker|notification)\b/,
  processing: /\b(pars\w+|transform\w*|pipeline|validat\w+|comput\w+)\b/,
  scheduling: /\b(schedul\w+|cron|timer|job|worker)\b/,
  reporting: /\b(report\w*|metric\w*|analytics|audit)\b/,
};

type Layer = 'data' | 'logic' | 'presentation';

const LAYER_KEYWORDS: Record<Exclude<Layer, 'logic'>, RegExp> = {
  data: /\b(store|storage|persist\w*|database|record|cache|load\w*|save\w*|schema|model)\b/i,
  presentation: /\b(display\w*|render\w*|show\w*|view|ui|print\w*|format\w*|output|report\w*|cli)\b/i,
};

const STOPWORDS = new Set([
  'must', 'should', 'could', 'shall', 'that', 'this', 'with', 'from', 'into', 'each', 'when',
  'then', 'have', 'will', 'their', 'which', 'every', 'given', 'able', 'only', 'also', 'such',
]);

export interface ComplexityScore {
  recipe: string;
  score: number;
  components: number;
  mustRequirements: number;
  functionalAreas: string[];
  exceedsBoundary: boolean;
}

export type DecompositionStrategy = 'functional' | 'layered' | 'risk-based';

interface ChildPlan {
  suffix: string;
  requirements: Requirement[];
  components: ComponentDesign[];
  /** Index of an earlier child this one builds on. */
  dependsOn: number | null;
}

export interface Decomposition {
  strategy: DecompositionStrategy;
  parent: Recipe;
  children: Recipe[];
}

function words(text: string): Set<string> {
  const found = text.toLowerCase().match(/[a-z][a-z0-9]+/g) ?? [];
  return new Set(found.filter((w) => w.length >= 4 && !STOPWORDS.has(w)));
}

function slug(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'part';
}

/** True when an interface name appears in a child plan's components or requirements. */
function mentions(plan: ChildPlan, name: string): boolean {
  const needle = name.toLowerCase();
  const haystack = [
    ...plan.components.map((c) => `${c.name} ${c.responsibility} ${c.signatures.join(' ')}`),
    ...plan.requirements.map(requirementText),
  ].join(' ').toLowerCase();
  return haystack.includes(needle);
}

function requirementText(req: Requirement): string {
  return [req.description, ...req.validationCriteria].join(' ');
}

export function detectFunctionalAreas(design: Design): string[] {
  const lower = design.components
    .map((c) => `${c.name} ${c.responsibility} ${c.signatures.join(' ')}`)
    .join('\n')
    .toLowerCase();
  return Object.entries(FUNCTIONAL_AREAS)
    .filter(([, pattern]) => pattern.test(lower))
    .map(([area]) => area);
}

export class ComplexityEvaluator {
  private config: ComplexityConfig;
  private store: RecipeStore;
  private logger: BuildLogger | null;

  constructor(config: ComplexityConfig, store: RecipeStore, logger: BuildLogger | null = null) {
    this.config = config;
    this.store = store;
    this.logger = logger;
  }

  evaluate(recipe: Recipe): ComplexityScore {
    const c = this.config;
    const components = recipe.design.components.length;
    const mustRequirements = recipe.requirements.requirements.filter((r) => r.priority === 'MUST').length;
    const functionalAreas = detectFunctionalAreas(recipe.design);
    const score =
      c.componentWeight * Math.max(0, components - c.componentThreshold)
      + c.mustWeight * Math.max(0, mustRequirements - c.mustThreshold)
      + c.areaWeight * Math.max(0, functionalAreas.length - c.areaThreshold);
    return {
      recipe: recipe.name,
      score,
      components,
      mustRequirements,
      functionalAreas,
      exceedsBoundary: score >= c.boundary,
    };
  }

  /** Split one recipe with the first strategy that yields at least two children, or null. */
  decompose(recipe: Recipe): Decomposition | null {
    const attempts: Array<[DecompositionStrategy, ChildPlan[]]> = [
      ['functional', this.functionalSplit(recipe)],
      ['layered', this.layeredSplit(recipe)],
      ['risk-based', this.riskSplit(recipe)],
    ];
    for (const [strategy, plans] of attempts) {
      if (plans.length < 2) continue;
      const children = this.buildChildren(recipe, plans);
      const parent = this.toAggregate(recipe, children.map((child) => child.name));
      return { strategy, parent, children };
    }
    return null;
  }

  /**
   * Decompose every recipe in the collection to a fixed point. Children are evaluated
   * again; `maxDepth` bounds the recursion.
   */
  expandAll(recipes: Map<string, Recipe>): Map<string, Recipe> {
    const result = new Map<string, Recipe>();
    const add = (recipe: Recipe) => {
      if (result.has(recipe.name)) {
        throw new ValidationError(`Decomposition produced a duplicate recipe name '${recipe.name}'`, {
          recipe: recipe.name,
          phase: 'decompose',
        });
      }
      result.set(recipe.name, recipe);
    };
    for (const recipe of recipes.values()) {
      for (const expanded of this.expand(recipe, 0)) add(expanded);
    }
    return result;
  }

  private expand(recipe: Recipe, depth: number): Recipe[] {
    if (recipe.metadata.attributes.aggregate === true) return [recipe];
    const score = this.evaluate(recipe);
    if (!score.exceedsBoundary) return [recipe];
    if (depth >= this.config.maxDepth) {
      throw new ComplexityExceededError(recipe.name, depth, score.score);
    }
    const decomposition = this.decompose(recipe);
    if (!decomposition) {
      throw new ComplexityExceededError(recipe.name, depth, score.score);
    }
    this.logger?.info('Decomposed recipe', {
      recipe: recipe.name,
      strategy: decomposition.strategy,
      score: score.score,
      children: decomposition.children.map((c) => c.name),
    });
    return [
      decomposition.parent,
      ...decomposition.children.flatMap((child) => this.expand(child, depth + 1)),
    ];
  }

  private functionalSplit(recipe: Recipe): ChildPlan[] {
    const { components } = recipe.design;
    const requirements = recipe.requirements.requirements;
    if (components.length < 2) return this.chunkSplit(recipe);

    const vocab = components.map((c) => words(`${c.name} ${c.responsibility} ${c.signatures.join(' ')}`));
    const buckets: Requirement[][] = components.map(() => []);
    for (const req of requirements) {
      const reqWords = words(requirementText(req));
      let best = -1;
      let bestOverlap = 0;
      vocab.forEach((v, index) => {
        const overlap = [...reqWords].filter((w) => v.has(w)).length;
        if (overlap > bestOverlap) {
          best = index;
          bestOverlap = overlap;
        }
      });
      if (best === -1) {
        // Unmatched requirements go to the least loaded component.
        best = buckets.reduce((min, bucket, index) => (bucket.length < buckets[min].length ? index : min), 0);
      }
      buckets[best].push(req);
    }

    const plans: ChildPlan[] = [];
    const orphans: ComponentDesign[] = [];
    components.forEach((component, index) => {
      if (buckets[index].length === 0) {
        orphans.push(component);
      } else {
        plans.push({ suffix: component.name, requirements: buckets[index], components: [component], dependsOn: null });
      }
    });
    if (plans.length > 0) plans[plans.length - 1].components.push(...orphans);
    return plans;
  }

  /** Feature chunks when the design names too few components to split by. */
  private chunkSplit(recipe: Recipe): ChildPlan[] {
    const requirements = recipe.requirements.requirements;
    const size = Math.max(1, this.config.mustThreshold);
    if (requirements.length <= size) return [];
    const plans: ChildPlan[] = [];
    for (let start = 0; start < requirements.length; start += size) {
      plans.push({
        suffix: `features-${plans.length + 1}`,
        requirements: requirements.slice(start, start + size),
        components: plans.length === 0 ? recipe.design.components : [],
        dependsOn: null,
      });
    }
    return plans;
  }

  private layeredSplit(recipe: Recipe): ChildPlan[] {
    const layerOf = (text: string): Layer => {
      if (LAYER_KEYWORDS.data.test(text)) return 'data';
      if (LAYER_KEYWORDS.presentation.test(text)) return 'presentation';
      return 'logic';
    };
    const layers: Layer[] = ['data', 'logic', 'presentation'];
    const plans: ChildPlan[] = [];
    for (const layer of layers) {
      const requirements = recipe.requirements.requirements.filter((r) => layerOf(requirementText(r)) === layer);
      if (requirements.length === 0) continue;
      const components = recipe.design.components.filter((c) => layerOf(`${c.name} ${c.responsibility}`) === layer);
      plans.push({
        suffix: `${layer}-layer`,
        requirements,
        components,
        dependsOn: plans.length > 0 ? plans.length - 1 : null,
      });
    }
    return plans;
  }

  private riskSplit(recipe: Recipe): ChildPlan[] {
    const core = recipe.requirements.requirements.filter((r) => r.priority === 'MUST');
    const extended = recipe.requirements.requirements.filter((r) => r.priority !== 'MUST');
    if (core.length === 0 || extended.length === 0) return [];
    return [
      { suffix: 'core', requirements: core, components: recipe.design.components, dependsOn: null },
      { suffix: 'extended', requirements: extended, components: [], dependsOn: 0 },
    ];
  }

  private buildChildren(parent: Recipe, plans: ChildPlan[]): Recipe[] {
    const names = plans.map((plan) => `${parent.name}-${slug(plan.suffix)}`);
    return plans.map((plan, index) => {
      const dependencies = [...parent.metadata.dependencies];
      if (plan.dependsOn !== null) dependencies.push(names[plan.dependsOn]);
      const sources = {
        requirements: renderRequirements({
          title: `${parent.requirements.title || parent.name}: ${plan.suffix}`,
          purpose: parent.requirements.purpose,
          requirements: plan.requirements,
          successCriteria: parent.requirements.successCriteria,
        }),
        design: renderDesign({
          architectureSummary: parent.design.architectureSummary,
          components: plan.components,
          interfaces: parent.design.interfaces.filter((i) => mentions(plan, i.name)),
        }),
        metadata: renderMetadata({
          name: names[index],
          version: parent.metadata.version,
          type: parent.metadata.type,
          description: `${plan.suffix} of ${parent.name}`,
          dependencies,
          attributes: { decomposedFrom: parent.name },
        }),
      };
      return this.store.fromSources(`${parent.location}#${slug(plan.suffix)}`, sources);
    });
  }

  /** The parent becomes a pure aggregation: no generation, depends on every child. */
  private toAggregate(parent: Recipe, childNames: string[]): Recipe {
    const metadata = {
      ...parent.metadata,
      dependencies: [...new Set([...parent.metadata.dependencies, ...childNames])],
      attributes: { ...parent.metadata.attributes, aggregate: true },
    };
    const sources = { ...parent.sources, metadata: renderMetadata(metadata) };
    return { ...parent, metadata, sources, contentChecksum: computeChecksum(sources) };
  }
}
