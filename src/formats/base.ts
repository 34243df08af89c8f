export type DocumentFormat = 'po' | 'json';

export interface TranslatableUnit {
  /** Stable within a document. */
  readonly id: string;
  readonly source: string;
  /** Existing translation; empty when there is none. */
  translation: string;
  /** Human-readable origin (file reference or key) for progress output. */
  readonly location?: string;
}

/**
 * A loaded translation file. Implementations own their units and keep their
 * own representation in sync when a translation is applied.
 */
export interface TranslationDocument<U extends TranslatableUnit = TranslatableUnit> {
  readonly format: DocumentFormat;
  /** Throws `DocumentLoadError`. */
  load(inputPath: string): Promise<void>;
  /**
   * Takes existing translations from a previously written output file.
   * Resolves false when the file does not exist; throws `DocumentLoadError`
   * when it exists but cannot be read.
   */
  resumeFrom(outputPath: string): Promise<boolean>;
  units(): readonly U[];
  applyTranslation(unit: U, text: string): void;
  /** Writes the whole document once; throws `OutputWriteError`. */
  save(outputPath: string): Promise<void>;
}
