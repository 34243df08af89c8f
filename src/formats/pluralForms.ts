const ONE_FORM = 'nplurals=1; plural=0;';
const TWO_FORMS = 'nplurals=2; plural=(n != 1);';
const TWO_FORMS_ZERO_SINGULAR = 'nplurals=2; plural=(n > 1);';
const EAST_SLAVIC = 'nplurals=3; plural=(n%10==1 && n%100!=11 ? 0 : n%10>=2 && n%10<=4 && (n%100<10 || n%100>=20) ? 1 : 2);';
const WEST_SLAVIC = 'nplurals=3; plural=(n==1) ? 0 : (n>=2 && n<=4) ? 1 : 2;';

/** Plural-Forms header values for common gettext locales. */
const PLURAL_FORMS: Record<string, string> = {
  ar: 'nplurals=6; plural=(n==0 ? 0 : n==1 ? 1 : n==2 ? 2 : n%100>=3 && n%100<=10 ? 3 : n%100>=11 ? 4 : 5);',
  bg: TWO_FORMS,
  cs: WEST_SLAVIC,
  da: TWO_FORMS,
  de: TWO_FORMS,
  el: TWO_FORMS,
  en: TWO_FORMS,
  es: TWO_FORMS,
  fi: TWO_FORMS,
  fr: TWO_FORMS_ZERO_SINGULAR,
  he: TWO_FORMS,
  hu: TWO_FORMS,
  id: ONE_FORM,
  it: TWO_FORMS,
  ja: ONE_FORM,
  ko: ONE_FORM,
  nb: TWO_FORMS,
  nl: TWO_FORMS,
  pl: 'nplurals=3; plural=(n==1 ? 0 : n%10>=2 && n%10<=4 && (n%100<10 || n%100>=20) ? 1 : 2);',
  pt: TWO_FORMS,
  pt_BR: TWO_FORMS_ZERO_SINGULAR,
  ru: EAST_SLAVIC,
  sk: WEST_SLAVIC,
  sv: TWO_FORMS,
  th: ONE_FORM,
  uk: EAST_SLAVIC,
  vi: ONE_FORM,
  zh: ONE_FORM,
};

/** Looks up `pt-BR` as `pt_BR`, then falls back to the bare language (`pt`). */
export function pluralFormsFor(lang: string): string | undefined {
  const normalized = lang.replace('-', '_');
  return PLURAL_FORMS[normalized] ?? PLURAL_FORMS[normalized.split('_')[0].toLowerCase()];
}

export function parseNplurals(header: string | undefined): number | undefined {
  const match = header ? /nplurals\s*=\s*(\d+)/.exec(header) : null;
  if (!match) {
    return undefined;
  }
  const count = Number(match[1]);
  return count > 0 ? count : undefined;
}
