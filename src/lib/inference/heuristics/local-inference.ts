/**
 * Local Inference
 * Heading-based module inference that needs no network access
 */

import { harvestHeadings, DEFAULT_DETECTORS, stripTags, MIN_TITLE_LENGTH } from './heading-detectors';
import type { Heading, HeadingDetector } from './heading-detectors';
import { defaultTierPolicy } from './tier-policy';
import type { TierPolicy } from './tier-policy';
import { generateDescription, describeSubsection, DEFAULT_DESCRIPTION_LENGTH } from './description';
import type { Module } from '../inference.types';
import { setSubmodule } from '../module-records';

const CHUNK_TITLE_LENGTH = 80;
const CHUNK_DESCRIPTION_LENGTH = 200;

export interface LocalInferenceOptions {
  detectors?: readonly HeadingDetector[];
  tierPolicy?: TierPolicy;
  descriptionLength?: number;
}

/**
 * `<li>` contents plus bulleted or numbered lines of normalized text
 */
export function findListItems(text: string): string[] {
  const items: string[] = [];

  for (const match of text.matchAll(/<li\b[^>]*>([\s\S]*?)<\/li\s*>/gi)) {
    items.push(stripTags(match[1]).replace(/\s+/g, ' ').trim());
  }
  for (const match of text.matchAll(/^[ \t]*(?:[•*-]|\d+\.)[ \t]+(.+)$/gm)) {
    items.push(match[1].trim());
  }

  return items.filter((item) => item.length >= MIN_TITLE_LENGTH);
}

/**
 * Split on blank lines when no headings exist
 */
function inferFromChunks(text: string, maxModules: number): Module[] {
  const modules: Module[] = [];
  const names = new Set<string>();

  const chunks = text
    .split(/\n\s*\n/)
    .map((chunk) => chunk.trim())
    .filter(Boolean);

  for (const chunk of chunks) {
    if (modules.length >= maxModules) break;

    const lines = chunk.split(/\r?\n/);
    const name = lines[0].trim().slice(0, CHUNK_TITLE_LENGTH);
    if (!name || names.has(name)) continue;
    names.add(name);

    const description =
      lines.length > 1
        ? lines.slice(1, 3).join(' ').replace(/\s+/g, ' ').trim()
        : chunk.slice(0, CHUNK_DESCRIPTION_LENGTH).trim();

    modules.push({ name, description, submodules: {} });
  }

  return modules;
}

/**
 * Index of the last position <= offset, or -1
 */
function ownerIndex(positions: readonly number[], offset: number): number {
  let owner = -1;
  for (let i = 0; i < positions.length && positions[i] <= offset; i++) {
    owner = i;
  }
  return owner;
}

/**
 * Infer modules from text using heading structure. Deterministic for a
 * given input and never throws.
 */
export function inferLocal(
  text: string,
  maxModules: number,
  options: LocalInferenceOptions = {}
): Module[] {
  if (maxModules <= 0 || !text.trim()) {
    return [];
  }

  const headings = harvestHeadings(text, options.detectors ?? DEFAULT_DETECTORS);
  if (headings.length === 0) {
    return inferFromChunks(text, maxModules);
  }

  const tierPolicy = options.tierPolicy ?? defaultTierPolicy;
  const descriptionLength = options.descriptionLength ?? DEFAULT_DESCRIPTION_LENGTH;
  const topLevel = tierPolicy.selectTopLevel(headings.map((heading) => heading.level));

  const top = headings.filter((heading) => heading.level === topLevel);
  const topPositions = top.map((heading) => heading.offset);

  const modules: Module[] = top.map((heading, index) => {
    const end = index + 1 < top.length ? top[index + 1].offset : text.length;
    const section = text.slice(heading.offset, end);
    return {
      name: heading.title,
      description: generateDescription(section, heading.title, descriptionLength),
      submodules: {},
    };
  });

  attachSubmodules(text, headings, topLevel, topPositions, modules);
  backfillListItems(text, topPositions, modules);

  return modules.slice(0, maxModules);
}

function attachSubmodules(
  text: string,
  headings: readonly Heading[],
  topLevel: number,
  topPositions: readonly number[],
  modules: Module[]
): void {
  headings.forEach((heading, index) => {
    if (heading.level <= topLevel) return;

    const owner = ownerIndex(topPositions, heading.offset);
    if (owner < 0) return;

    const next = headings.slice(index + 1).find((other) => other.offset > heading.offset);
    const snippet = text.slice(heading.offset, next ? next.offset : text.length);

    const items = findListItems(snippet);
    if (items.length > 0) {
      for (const item of items) {
        setSubmodule(modules[owner].submodules, item, '');
      }
    } else {
      setSubmodule(modules[owner].submodules, heading.title, describeSubsection(snippet, heading.title));
    }
  });
}

function backfillListItems(text: string, topPositions: readonly number[], modules: Module[]): void {
  modules.forEach((module, index) => {
    if (Object.keys(module.submodules).length > 0) return;

    const end = index + 1 < topPositions.length ? topPositions[index + 1] : text.length;
    for (const item of findListItems(text.slice(topPositions[index], end))) {
      setSubmodule(module.submodules, item, '');
    }
  });
}
