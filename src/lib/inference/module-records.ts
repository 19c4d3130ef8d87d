/**
 * Module Records
 * Conversion between in-memory modules and their serialized output shape
 */

import type { Module, ModuleRecord } from './inference.types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickString(source: JsonObject, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') return value;
  }
  return undefined;
}

function pickNumber(source: JsonObject, keys: readonly string[]): number | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) return Number(value);
  }
  return undefined;
}

/**
 * Add a submodule as an own property, so a name such as `__proto__` is kept
 */
export function setSubmodule(submodules: Record<string, string>, name: string, description: string): void {
  Object.defineProperty(submodules, name, { value: description, enumerable: true, writable: true, configurable: true });
}

/**
 * Submodules may arrive as a name -> description object, a list of names,
 * or a list of { name, description } objects
 */
function readSubmodules(value: unknown): Record<string, string> {
  const submodules: Record<string, string> = {};

  if (Array.isArray(value)) {
    for (const entry of value) {
      if (typeof entry === 'string') {
        setSubmodule(submodules, entry, '');
      } else if (isObject(entry)) {
        const name = pickString(entry, ['name', 'submodule', 'Submodule', 'module']);
        if (name) {
          setSubmodule(submodules, name, pickString(entry, ['description', 'Description']) ?? '');
        }
      }
    }
    return submodules;
  }

  if (isObject(value)) {
    for (const [name, description] of Object.entries(value)) {
      if (typeof description === 'string') {
        setSubmodule(submodules, name, description);
      } else if (isObject(description)) {
        setSubmodule(
          submodules,
          name,
          pickString(description, ['description', 'Description']) ?? JSON.stringify(description)
        );
      } else if (description === null || description === undefined) {
        setSubmodule(submodules, name, '');
      } else {
        setSubmodule(submodules, name, String(description));
      }
    }
  }

  return submodules;
}

export function toRecord(module: Module): ModuleRecord {
  const record: ModuleRecord = {
    module: module.name,
    Description: module.description,
    Submodules: { ...module.submodules },
  };
  if (module.confidence !== undefined) {
    record.confidence = module.confidence;
  }
  return record;
}

export function toRecords(modules: readonly Module[]): ModuleRecord[] {
  return modules.map(toRecord);
}

/**
 * Read modules from parsed JSON. Entries without a name are skipped.
 */
export function fromRecords(value: unknown): Module[] {
  if (!Array.isArray(value)) {
    return [];
  }

  const modules: Module[] = [];
  for (const entry of value) {
    if (!isObject(entry)) continue;

    const name = pickString(entry, ['module', 'Module', 'name']);
    if (!name || !name.trim()) continue;

    const module: Module = {
      name: name.trim(),
      description: pickString(entry, ['Description', 'description']) ?? '',
      submodules: readSubmodules(entry.Submodules ?? entry.submodules),
    };

    const confidence = pickNumber(entry, ['confidence', 'Confidence']);
    if (confidence !== undefined) {
      module.confidence = confidence;
    }
    modules.push(module);
  }
  return modules;
}

/**
 * 0.5 base plus up to 0.2 for description length (full at 200 chars) and
 * up to 0.2 for submodules (full at 5), capped at 0.98
 */
export function heuristicConfidence(module: Module): number {
  const descriptionScore = Math.min((module.description.length / 200) * 0.2, 0.2);
  const submoduleScore = Math.min((Object.keys(module.submodules).length / 5) * 0.2, 0.2);
  const score = Math.min(0.5 + descriptionScore + submoduleScore, 0.98);
  return Math.round(score * 100) / 100;
}

/**
 * Fill in missing confidence scores. Existing scores are kept.
 */
export function backfillConfidence(modules: readonly Module[]): Module[] {
  return modules.map((module) =>
    module.confidence === undefined ? { ...module, confidence: heuristicConfidence(module) } : module
  );
}

/**
 * Confidence as a 0-1 fraction. Models sometimes report percentages.
 */
export function displayConfidence(confidence: number): number {
  return confidence > 1 ? confidence / 100 : confidence;
}
