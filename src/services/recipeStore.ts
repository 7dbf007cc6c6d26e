/** Loads recipes (requirements.md, design.md, components.json) from disk into validated models. */

import crypto from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type {
  ComponentDesign,
  ComponentMetadata,
  Design,
  InterfaceDescriptor,
  Priority,
  Recipe,
  RecipeSources,
  Requirement,
  RequirementSet,
} from '../models/recipe.js';
import { DESIGN_FILE, METADATA_FILE, REQUIREMENTS_FILE } from '../utils/constants.js';
import { ParseError } from '../utils/errors.js';
import { ComponentsFileSchema, normalizeAttributes } from '../utils/recipeSchema.js';

const HEADING_RE = /^(#{1,6})\s+(.+?)\s*#*\s*$/;
const BULLET_RE = /^(\s*)[-*+]\s+(.*)$/;
const REQUIREMENT_RE = /^(?:\[([A-Za-z][\w.-]*)\]\s*)?(MUST|SHOULD|COULD)\b[:\s]\s*(.+)$/;
const FENCE_RE = /^\s*(```|~~~)/;

interface SourceLine {
  text: string;
  lineNo: number;
}

/** Lines of a markdown document outside fenced code blocks, with 1-based line numbers. */
function proseLines(markdown: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let inFence = false;
  markdown.split(/\r?\n/).forEach((text, index) => {
    if (FENCE_RE.test(text)) {
      inFence = !inFence;
      return;
    }
    if (!inFence) lines.push({ text, lineNo: index + 1 });
  });
  return lines;
}

function stripEmphasis(text: string): string {
  return text.replace(/\*\*|__/g, '').trim();
}

type RequirementSection = 'purpose' | 'functional' | 'non-functional' | 'success' | 'other';

function requirementSection(heading: string): RequirementSection {
  const h = heading.toLowerCase();
  if (h.startsWith('purpose')) return 'purpose';
  if (h.startsWith('non-functional') || h.startsWith('nonfunctional')) return 'non-functional';
  if (h.startsWith('functional')) return 'functional';
  if (h.startsWith('success')) return 'success';
  return 'other';
}

export function parseRequirements(markdown: string): RequirementSet {
  let title = '';
  const purpose: string[] = [];
  const requirements: Requirement[] = [];
  const successCriteria: string[] = [];
  const seenIds = new Map<string, number>();
  let section: RequirementSection = 'other';
  let current: Requirement | null = null;

  for (const { text, lineNo } of proseLines(markdown)) {
    const heading = text.match(HEADING_RE);
    if (heading) {
      if (heading[1].length === 1 && !title) {
        title = heading[2].trim();
      } else if (heading[1].length === 2) {
        section = requirementSection(heading[2]);
        current = null;
      }
      continue;
    }
    if (!text.trim()) continue;

    if (section === 'purpose') {
      purpose.push(text.trim());
      continue;
    }
    if (section === 'success') {
      const bullet = text.match(BULLET_RE);
      if (bullet) successCriteria.push(stripEmphasis(bullet[2]));
      continue;
    }
    if (section !== 'functional' && section !== 'non-functional') continue;

    const bullet = text.match(BULLET_RE);
    if (!bullet) {
      if (current && /^\s+/.test(text)) current.description += ' ' + text.trim();
      continue;
    }

    if (bullet[1].length >= 2) {
      if (!current) {
        throw new ParseError(REQUIREMENTS_FILE, 'validation criterion appears before any requirement', lineNo);
      }
      current.validationCriteria.push(stripEmphasis(bullet[2]));
      continue;
    }

    const match = stripEmphasis(bullet[2]).match(REQUIREMENT_RE);
    if (!match) {
      throw new ParseError(
        REQUIREMENTS_FILE,
        `expected "- MUST|SHOULD|COULD <requirement>", got "${bullet[2].trim()}"`,
        lineNo,
      );
    }
    const id = match[1] ?? `req_${requirements.length + 1}`;
    const previous = seenIds.get(id);
    if (previous !== undefined) {
      throw new ParseError(REQUIREMENTS_FILE, `duplicate requirement id "${id}" (first defined on line ${previous})`, lineNo);
    }
    seenIds.set(id, lineNo);
    const priority: Priority = match[2] === 'MUST' ? 'MUST' : match[2] === 'SHOULD' ? 'SHOULD' : 'COULD';
    current = {
      id,
      description: match[3].trim(),
      priority,
      category: section,
      validationCriteria: [],
      implemented: false,
    };
    requirements.push(current);
  }

  if (requirements.length === 0) {
    throw new ParseError(REQUIREMENTS_FILE, 'no requirements found under "## Functional Requirements"');
  }
  return { title, purpose: purpose.join(' '), requirements, successCriteria };
}

type DesignSection = 'architecture' | 'components' | 'interfaces' | 'other';

function designSection(heading: string): DesignSection {
  const h = heading.toLowerCase();
  if (h.startsWith('architecture')) return 'architecture';
  if (h.startsWith('component')) return 'components';
  if (h.startsWith('interface')) return 'interfaces';
  return 'other';
}

export function parseDesign(markdown: string): Design {
  const summary: string[] = [];
  const components: ComponentDesign[] = [];
  const interfaces: InterfaceDescriptor[] = [];
  let section: DesignSection = 'other';
  let sawArchitecture = false;
  let component: ComponentDesign | null = null;

  for (const { text } of proseLines(markdown)) {
    const heading = text.match(HEADING_RE);
    if (heading) {
      const level = heading[1].length;
      if (level === 2) {
        section = designSection(heading[2]);
        if (section === 'architecture') sawArchitecture = true;
        component = null;
      } else if (level === 3 && section === 'components') {
        component = { name: stripEmphasis(heading[2]).replace(/`/g, ''), responsibility: '', signatures: [] };
        components.push(component);
      }
      continue;
    }
    if (!text.trim()) continue;

    if (section === 'architecture') {
      summary.push(text.trim());
    } else if (section === 'components' && component) {
      const bullet = text.match(BULLET_RE);
      const code = bullet ? bullet[2].match(/`([^`]+)`/) : null;
      if (code) {
        component.signatures.push(code[1].trim());
      } else if (!bullet) {
        component.responsibility = [component.responsibility, text.trim()].filter(Boolean).join(' ');
      }
    } else if (section === 'interfaces') {
      const bullet = text.match(BULLET_RE);
      if (!bullet) continue;
      const body = stripEmphasis(bullet[2]);
      const named = body.match(/^`?([^`:]+?)`?\s*:\s*(.*)$/);
      interfaces.push(named
        ? { name: named[1].trim(), description: named[2].trim() }
        : { name: body.replace(/`/g, ''), description: '' });
    }
  }

  if (!sawArchitecture) {
    throw new ParseError(DESIGN_FILE, 'missing "## Architecture" section');
  }
  return { architectureSummary: summary.join(' '), components, interfaces };
}

/** Line number of a JSON.parse failure, from either "line N" or "position N" in the message. */
function jsonErrorLine(message: string, source: string): number | null {
  const line = message.match(/line (\d+)/);
  if (line) return Number(line[1]);
  const position = message.match(/position (\d+)/);
  if (position) return source.slice(0, Number(position[1])).split('\n').length;
  return null;
}

export function parseMetadata(json: string): ComponentMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ParseError(METADATA_FILE, `invalid JSON: ${message}`, jsonErrorLine(message, json));
  }
  const parsed = ComponentsFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ParseError(METADATA_FILE, issues);
  }
  const { name, version, type, dependencies, description, metadata } = parsed.data;
  return { name, version, type, description, dependencies, attributes: normalizeAttributes(metadata) };
}

/** sha256 over the concatenated requirements, design and metadata texts. */
export function computeChecksum(sources: RecipeSources): string {
  return crypto
    .createHash('sha256')
    .update(sources.requirements)
    .update(sources.design)
    .update(sources.metadata)
    .digest('hex');
}

export function renderRequirements(set: RequirementSet): string {
  const lines = [`# ${set.title}`, '', '## Purpose', set.purpose || set.title, ''];
  const sections: Array<[string, Requirement['category']]> = [
    ['Functional Requirements', 'functional'],
    ['Non-Functional Requirements', 'non-functional'],
  ];
  for (const [heading, category] of sections) {
    const reqs = set.requirements.filter((r) => r.category === category);
    if (reqs.length === 0) continue;
    lines.push(`## ${heading}`);
    for (const req of reqs) {
      lines.push(`- [${req.id}] ${req.priority} ${req.description}`);
      for (const criterion of req.validationCriteria) lines.push(`  - ${criterion}`);
    }
    lines.push('');
  }
  if (set.successCriteria.length > 0) {
    lines.push('## Success Criteria', ...set.successCriteria.map((c) => `- ${c}`), '');
  }
  return lines.join('\n');
}

export function renderDesign(design: Design): string {
  const lines = ['# Design', '', '## Architecture', design.architectureSummary || 'Aggregated component.', ''];
  if (design.components.length > 0) {
    lines.push('## Components', '');
    for (const component of design.components) {
      lines.push(`### ${component.name}`, component.responsibility, '');
      for (const signature of component.signatures) lines.push(`- \`${signature}\``);
      if (component.signatures.length > 0) lines.push('');
    }
  }
  if (design.interfaces.length > 0) {
    lines.push('## Interfaces', ...design.interfaces.map((i) => `- ${i.name}: ${i.description}`), '');
  }
  return lines.join('\n');
}

export function renderMetadata(metadata: ComponentMetadata): string {
  return JSON.stringify({
    name: metadata.name,
    version: metadata.version,
    type: metadata.type,
    dependencies: metadata.dependencies,
    description: metadata.description,
    metadata: metadata.attributes,
  }, null, 2) + '\n';
}

export class RecipeStore {
  /** Build a Recipe from its three source texts. `location` is kept as an opaque handle. */
  fromSources(location: string, sources: RecipeSources): Recipe {
    const requirements = parseRequirements(sources.requirements);
    const design = parseDesign(sources.design);
    const metadata = parseMetadata(sources.metadata);
    return {
      name: metadata.name,
      location,
      requirements,
      design,
      metadata,
      sources,
      contentChecksum: computeChecksum(sources),
    };
  }

  loadOne(location: string): Recipe {
    const read = (file: string): string => {
      const filePath = path.join(location, file);
      if (!fs.existsSync(filePath)) {
        throw new ParseError(filePath, 'file not found');
      }
      return fs.readFileSync(filePath, 'utf-8');
    };
    const sources: RecipeSources = {
      requirements: read(REQUIREMENTS_FILE),
      design: read(DESIGN_FILE),
      metadata: read(METADATA_FILE),
    };
    try {
      return this.fromSources(location, sources);
    } catch (err) {
      if (err instanceof ParseError) {
        throw new ParseError(path.join(location, err.artifact), err.detail, err.line);
      }
      throw err;
    }
  }

  /** Every directory under `root` containing components.json, keyed by recipe name. */
  loadAll(root: string): Map<string, Recipe> {
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      throw new ParseError(root, 'recipe collection directory not found');
    }
    const recipes = new Map<string, Recipe>();
    for (const dir of this.findRecipeDirs(root)) {
      const recipe = this.loadOne(dir);
      const existing = recipes.get(recipe.name);
      if (existing) {
        throw new ParseError(METADATA_FILE, `duplicate recipe name "${recipe.name}" in ${existing.location} and ${dir}`);
      }
      recipes.set(recipe.name, recipe);
    }
    return recipes;
  }

  /**
   * Load the recipe at `entry` and, by dependency name, every recipe it transitively
   * needs from the collection rooted at `root`. Recipes outside that closure are only
   * indexed by name, never parsed. Unknown names are left for the resolver.
   */
  loadTree(root: string, entry: string): Map<string, Recipe> {
    const index = this.indexByName(root);
    const start = this.loadOne(entry);
    const tree = new Map<string, Recipe>([[start.name, start]]);
    const queue = [...start.metadata.dependencies];
    for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
      if (tree.has(name)) continue;
      const dirs = index.get(name);
      if (!dirs) continue;
      if (dirs.length > 1) {
        throw new ParseError(METADATA_FILE, `duplicate recipe name "${name}" in ${dirs.join(' and ')}`);
      }
      const dep = this.loadOne(dirs[0]);
      tree.set(name, dep);
      queue.push(...dep.metadata.dependencies);
    }
    return tree;
  }

  /** A location is a single recipe if it holds components.json, otherwise a collection. */
  load(location: string): Map<string, Recipe> {
    if (fs.existsSync(path.join(location, METADATA_FILE))) {
      const parent = path.dirname(path.resolve(location));
      if (this.findRecipeDirs(parent).length > 1) return this.loadTree(parent, location);
      const recipe = this.loadOne(location);
      return new Map([[recipe.name, recipe]]);
    }
    return this.loadAll(location);
  }

  /** Recipe directories under `root` by the name in their components.json; unreadable ones are skipped. */
  private indexByName(root: string): Map<string, string[]> {
    const index = new Map<string, string[]>();
    for (const dir of this.findRecipeDirs(root)) {
      const name = peekName(path.join(dir, METADATA_FILE));
      if (name === null) continue;
      index.set(name, [...(index.get(name) ?? []), dir]);
    }
    return index;
  }

  private findRecipeDirs(root: string): string[] {
    const found: string[] = [];
    const walk = (dir: string) => {
      if (fs.existsSync(path.join(dir, METADATA_FILE))) found.push(dir);
      for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
        if (!entry.isDirectory() || entry.name.startsWith('.') || entry.name === 'node_modules') continue;
        walk(path.join(dir, entry.name));
      }
    };
    walk(root);
    return found.sort();
  }
}

function peekName(file: string): string | null {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || !('name' in parsed)) return null;
    return typeof parsed.name === 'string' ? parsed.name : null;
  } catch {
    return null;
  }
}
