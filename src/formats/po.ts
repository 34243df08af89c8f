import { promises as fs } from 'fs';
import { GetTextTranslation, GetTextTranslations, po } from 'gettext-parser';
import { DocumentLoadError, OutputWriteError } from '../errors.js';
import { fileExists, writeFileAtomic } from '../helpers.js';
import { TranslatableUnit, TranslationDocument } from './base.js';
import { parseNplurals, pluralFormsFor } from './pluralForms.js';

export interface PoUnit extends TranslatableUnit {
  readonly entry: GetTextTranslation;
  /** Index into `entry.msgstr`. */
  readonly form: number;
}

export interface PoDocumentOptions {
  targetLang: string;
}

// Separator gettext itself uses between msgctxt and msgid.
const CONTEXT_SEPARATOR = '\u0004';

async function readCatalog(filePath: string): Promise<GetTextTranslations> {
  try {
    return po.parse(await fs.readFile(filePath));
  } catch (error) {
    throw new DocumentLoadError(filePath, error);
  }
}

function entryKey(msgctxt: string, msgid: string): string {
  return msgctxt ? `${msgctxt}${CONTEXT_SEPARATOR}${msgid}` : msgid;
}

function pluralSource(entry: GetTextTranslation): string | undefined {
  return typeof entry.msgid_plural === 'string' && entry.msgid_plural !== '' ? entry.msgid_plural : undefined;
}

/**
 * gettext catalog. msgid/msgid_plural, comments, flags and references are
 * carried over untouched; only msgstr values change. The header gets the
 * target `Language` and its `Plural-Forms`.
 */
export class PoDocument implements TranslationDocument<PoUnit> {
  readonly format = 'po';
  private catalog: GetTextTranslations = { charset: 'utf-8', headers: {}, translations: {} };
  private unitList: PoUnit[] = [];
  private nplurals = 2;

  constructor(private readonly options: PoDocumentOptions) {}

  async load(inputPath: string): Promise<void> {
    this.catalog = await readCatalog(inputPath);
    this.updateHeaders();
    this.buildUnits();
  }

  async resumeFrom(outputPath: string): Promise<boolean> {
    if (!(await fileExists(outputPath))) {
      return false;
    }
    const existing = await readCatalog(outputPath);

    for (const [msgctxt, entries] of Object.entries(this.catalog.translations)) {
      for (const [msgid, entry] of Object.entries(entries)) {
        const previous = existing.translations[msgctxt]?.[msgid];
        if (msgid !== '' && previous && previous.msgstr.some(value => value.trim() !== '')) {
          entry.msgstr = [...previous.msgstr];
        }
      }
    }

    this.updateHeaders(existing.headers['Plural-Forms']);
    this.buildUnits();
    return true;
  }

  units(): readonly PoUnit[] {
    return this.unitList;
  }

  applyTranslation(unit: PoUnit, text: string): void {
    unit.translation = text;
    unit.entry.msgstr[unit.form] = text;
  }

  get headers(): Readonly<Record<string, string>> {
    return this.catalog.headers;
  }

  toBuffer(): Buffer {
    return po.compile(this.catalog);
  }

  async save(outputPath: string): Promise<void> {
    try {
      await writeFileAtomic(outputPath, this.toBuffer());
    } catch (error) {
      throw new OutputWriteError(outputPath, error);
    }
  }

  private updateHeaders(resumedPluralForms?: string): void {
    const headers = this.catalog.headers;
    headers['Language'] = this.options.targetLang;

    const pluralForms = pluralFormsFor(this.options.targetLang) ?? resumedPluralForms;
    if (pluralForms) {
      headers['Plural-Forms'] = pluralForms;
    }
    if (!headers['Content-Type']) {
      headers['Content-Type'] = 'text/plain; charset=UTF-8';
    }
    if (!headers['Content-Transfer-Encoding']) {
      headers['Content-Transfer-Encoding'] = '8bit';
    }

    this.nplurals = parseNplurals(headers['Plural-Forms']) ?? 2;
  }

  private buildUnits(): void {
    this.unitList = [];

    for (const [msgctxt, entries] of Object.entries(this.catalog.translations)) {
      for (const [msgid, entry] of Object.entries(entries)) {
        if (msgid === '') {
          continue;
        }
        const key = entryKey(msgctxt, msgid);
        const location = entry.comments?.reference?.split(/\s+/)[0] || key;
        const plural = pluralSource(entry);

        if (!plural) {
          if (entry.msgstr.length === 0) {
            entry.msgstr = [''];
          }
          this.unitList.push({ id: key, source: msgid, translation: entry.msgstr[0], location, entry, form: 0 });
          continue;
        }

        // msgfmt rejects more msgstr[n] than the header's nplurals.
        while (entry.msgstr.length < this.nplurals) {
          entry.msgstr.push('');
        }
        entry.msgstr = entry.msgstr.slice(0, this.nplurals);
        for (let form = 0; form < this.nplurals; form++) {
          this.unitList.push({
            id: `${key}[${form}]`,
            source: form === 0 ? msgid : plural,
            translation: entry.msgstr[form],
            location,
            entry,
            form,
          });
        }
      }
    }
  }
}
