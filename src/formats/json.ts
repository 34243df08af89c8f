import { promises as fs } from 'fs';
import { DocumentLoadError, OutputWriteError } from '../errors.js';
import { fileExists, isBlank, writeFileAtomic } from '../helpers.js';
import { TranslatableUnit, TranslationDocument } from './base.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export interface JsonDocumentOptions {
  sortKeys?: boolean;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readJsonObject(filePath: string): Promise<JsonObject> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new DocumentLoadError(filePath, error);
  }
  if (!isJsonObject(parsed)) {
    throw new DocumentLoadError(filePath, new Error('expected a JSON object at the root'));
  }
  return parsed;
}

/**
 * Flat key/value dictionary (`{"account.title": "Account"}`). Keys stay,
 * string values are translated, any other value is passed through.
 */
export class JsonDocument implements TranslationDocument {
  readonly format = 'json';
  private source: JsonObject = {};
  private output = new Map<string, string>();
  private unitList: TranslatableUnit[] = [];

  constructor(private readonly options: JsonDocumentOptions = {}) {}

  async load(inputPath: string): Promise<void> {
    this.source = await readJsonObject(inputPath);
    this.output.clear();
    this.unitList = [];
    for (const [key, value] of Object.entries(this.source)) {
      if (typeof value === 'string') {
        this.unitList.push({ id: key, source: value, translation: '', location: key });
      }
    }
  }

  async resumeFrom(outputPath: string): Promise<boolean> {
    if (!(await fileExists(outputPath))) {
      return false;
    }
    const existing = await readJsonObject(outputPath);
    for (const unit of this.unitList) {
      const previous = existing[unit.id];
      // A failed unit leaves its source value in the final output.
      if (typeof previous === 'string' && !isBlank(previous) && previous !== unit.source) {
        unit.translation = previous;
        this.output.set(unit.id, previous);
      }
    }
    return true;
  }

  units(): readonly TranslatableUnit[] {
    return this.unitList;
  }

  applyTranslation(unit: TranslatableUnit, text: string): void {
    unit.translation = text;
    this.output.set(unit.id, text);
  }

  /** Every input key in input order; untranslated keys keep their source value. */
  toJson(): JsonObject {
    // fromEntries defines own properties, so a "__proto__" key survives.
    const result: JsonObject = Object.fromEntries(
      Object.entries(this.source).map(([key, value]) => [key, this.output.get(key) ?? value]),
    );
    return this.options.sortKeys ? sortObjectKeys(result) : result;
  }

  async save(outputPath: string): Promise<void> {
    const content = `${JSON.stringify(this.toJson(), null, 2)}\n`;
    try {
      await writeFileAtomic(outputPath, content);
    } catch (error) {
      throw new OutputWriteError(outputPath, error);
    }
  }
}

export function sortObjectKeys(obj: JsonObject): JsonObject {
  return Object.fromEntries(Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}
