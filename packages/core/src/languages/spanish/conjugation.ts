// corrector/languages/spanish/conjugation - Spanish conjugation tables
// Regular endings live here; irregular forms and stem-change classes are
// read from packages/core/data/spanish/*.json.

import fs from 'fs';
import { defineTable } from '../../registry.js';
import type { ConjugationTables, StemChangeKind, VerbClass } from '../../verbs/types.js';

const DATA_DIR = new URL('../../../data/spanish/', import.meta.url);

// =============================================================================
// REGULAR ENDINGS
// =============================================================================

const PRESENT: Record<VerbClass, string[]> = {
  ar: ['o', 'as', 'a', 'amos', 'áis', 'an'],
  er: ['o', 'es', 'e', 'emos', 'éis', 'en'],
  ir: ['o', 'es', 'e', 'imos', 'ís', 'en'],
};

const PRETERITE_AR = ['é', 'aste', 'ó', 'amos', 'asteis', 'aron'];
const PRETERITE_ER_IR = ['í', 'iste', 'ió', 'imos', 'isteis', 'ieron'];

const IMPERFECT_AR = ['aba', 'abas', 'aba', 'ábamos', 'abais', 'aban'];
const IMPERFECT_ER_IR = ['ía', 'ías', 'ía', 'íamos', 'íais', 'ían'];

const SUBJUNCTIVE_PRESENT_AR = ['e', 'es', 'e', 'emos', 'éis', 'en'];
const SUBJUNCTIVE_PRESENT_ER_IR = ['a', 'as', 'a', 'amos', 'áis', 'an'];

const SUBJUNCTIVE_RA_AR = ['ara', 'aras', 'ara', 'áramos', 'arais', 'aran'];
const SUBJUNCTIVE_RA_ER_IR = ['iera', 'ieras', 'iera', 'iéramos', 'ierais', 'ieran'];

const SUBJUNCTIVE_SE_AR = ['ase', 'ases', 'ase', 'ásemos', 'aseis', 'asen'];
const SUBJUNCTIVE_SE_ER_IR = ['iese', 'ieses', 'iese', 'iésemos', 'ieseis', 'iesen'];

const SUBJUNCTIVE_FUTURE_AR = ['are', 'ares', 'are', 'áremos', 'areis', 'aren'];
const SUBJUNCTIVE_FUTURE_ER_IR = ['iere', 'ieres', 'iere', 'iéremos', 'iereis', 'ieren'];

// Gerund, participle (with agreement) and vosotros imperative
const NON_FINITE_AR = ['ando', 'ado', 'ada', 'ados', 'adas', 'ad'];
const NON_FINITE_ER = ['iendo', 'ido', 'ida', 'idos', 'idas', 'ed'];
const NON_FINITE_IR = ['iendo', 'ido', 'ida', 'idos', 'idas', 'id'];

export const FUTURE_ENDINGS = ['é', 'ás', 'á', 'emos', 'éis', 'án'];
export const CONDITIONAL_ENDINGS = ['ía', 'ías', 'ía', 'íamos', 'íais', 'ían'];

export const REGULAR_ENDINGS: Record<VerbClass, readonly string[]> = {
  ar: [
    ...PRESENT.ar, ...PRETERITE_AR, ...IMPERFECT_AR, ...SUBJUNCTIVE_PRESENT_AR,
    ...SUBJUNCTIVE_RA_AR, ...SUBJUNCTIVE_SE_AR, ...SUBJUNCTIVE_FUTURE_AR, ...NON_FINITE_AR,
  ],
  er: [
    ...PRESENT.er, ...PRETERITE_ER_IR, ...IMPERFECT_ER_IR, ...SUBJUNCTIVE_PRESENT_ER_IR,
    ...SUBJUNCTIVE_RA_ER_IR, ...SUBJUNCTIVE_SE_ER_IR, ...SUBJUNCTIVE_FUTURE_ER_IR, ...NON_FINITE_ER,
  ],
  ir: [
    ...PRESENT.ir, ...PRETERITE_ER_IR, ...IMPERFECT_ER_IR, ...SUBJUNCTIVE_PRESENT_ER_IR,
    ...SUBJUNCTIVE_RA_ER_IR, ...SUBJUNCTIVE_SE_ER_IR, ...SUBJUNCTIVE_FUTURE_ER_IR, ...NON_FINITE_IR,
  ],
};

// Stressed-stem endings: singular persons and 3rd plural in both presents
const STEM_CHANGE_ENDINGS: Record<VerbClass, readonly string[]> = {
  ar: ['o', 'as', 'a', 'an', 'e', 'es', 'e', 'en', 'ue', 'ues', 'uen'],
  er: ['o', 'es', 'e', 'en', 'a', 'as', 'a', 'an'],
  ir: ['o', 'es', 'e', 'en', 'a', 'as', 'a', 'an', 'iendo', 'ió', 'ieron'],
};

const FRONT_VOWEL_ENDINGS = ['e', 'es', 'emos', 'éis', 'en', 'é'];

export const VERB_PREFIXES = [
  'contra', 'entre', 'sobre', 'super', 'trans', 'inter',
  'ante', 'anti', 'auto', 'semi',
  'pre', 'sub', 'com', 'con', 'dis', 'pro', 'des',
  're', 'co', 'ex', 'in', 'en', 'im',
];

export const CLITIC_PRONOUNS = ['me', 'te', 'se', 'nos', 'os', 'lo', 'la', 'le', 'los', 'las', 'les'];

const MONOSYLLABIC_IMPERATIVES = ['da', 'dá', 'di', 'dí', 've', 'pon', 'sal', 'ten', 'ven', 'haz', 'se', 'sé'];

// =============================================================================
// JSON TABLES
// =============================================================================

export interface IrregularVerbsFile {
  forms: Record<string, string[]>;
  ucirVerbs: string[];
}

export type StemChangingVerbsFile = Record<StemChangeKind, string[]>;

// -ucir verbs share a preterite and past subjunctive built on "-uj-": conducir → conduje
const UCIR_TAILS = [
  'uje', 'ujiste', 'ujo', 'ujimos', 'ujisteis', 'ujeron',
  'ujera', 'ujeras', 'ujéramos', 'ujerais', 'ujeran',
  'ujese', 'ujeses', 'ujésemos', 'ujeseis', 'ujesen',
  'ujere', 'ujeres', 'ujéremos', 'ujereis', 'ujeren',
];

function readJson(fileName: string): unknown {
  return JSON.parse(fs.readFileSync(new URL(fileName, DATA_DIR), 'utf-8'));
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseIrregularVerbs(raw: unknown): IrregularVerbsFile {
  if (!isRecord(raw) || !isRecord(raw.forms) || !isStringArray(raw.ucirVerbs)) {
    throw new Error('irregular-verbs.json: expected { forms, ucirVerbs }');
  }
  const forms: Record<string, string[]> = {};
  for (const [infinitive, list] of Object.entries(raw.forms)) {
    if (!isStringArray(list)) {
      throw new Error(`irregular-verbs.json: forms of "${infinitive}" must be a string array`);
    }
    forms[infinitive] = list;
  }
  return { forms, ucirVerbs: raw.ucirVerbs };
}

const STEM_CHANGE_KINDS: readonly StemChangeKind[] = ['e-ie', 'o-ue', 'e-i', 'u-ue', 'c-zc'];

function parseStemChangingVerbs(raw: unknown): StemChangingVerbsFile {
  if (!isRecord(raw)) {
    throw new Error('stem-changing-verbs.json: expected an object keyed by alternation');
  }
  const result: StemChangingVerbsFile = { 'e-ie': [], 'o-ue': [], 'e-i': [], 'u-ue': [], 'c-zc': [] };
  for (const kind of STEM_CHANGE_KINDS) {
    const list = raw[kind];
    if (list === undefined) continue;
    if (!isStringArray(list)) {
      throw new Error(`stem-changing-verbs.json: "${kind}" must be a string array`);
    }
    result[kind] = list;
  }
  return result;
}

export function buildIrregularForms(file: IrregularVerbsFile): Map<string, string> {
  const map = new Map<string, string>();
  for (const [infinitive, forms] of Object.entries(file.forms)) {
    for (const form of forms) {
      map.set(form, infinitive);
    }
  }
  for (const verb of file.ucirVerbs) {
    const stem = verb.slice(0, -'ucir'.length);
    for (const tail of UCIR_TAILS) {
      map.set(stem + tail, verb);
    }
  }
  return map;
}

export function buildStemChanges(file: StemChangingVerbsFile): Map<string, StemChangeKind> {
  const map = new Map<string, StemChangeKind>();
  for (const kind of STEM_CHANGE_KINDS) {
    for (const verb of file[kind]) {
      map.set(verb, kind);
    }
  }
  return map;
}

// =============================================================================
// TABLE ASSEMBLY
// =============================================================================

/**
 * Build a fresh set of Spanish conjugation tables. Reads the JSON data on
 * every call; use `getSpanishConjugation` for the shared instance.
 */
export function createSpanishConjugation(): ConjugationTables {
  return {
    irregularForms: buildIrregularForms(parseIrregularVerbs(readJson('irregular-verbs.json'))),
    stemChanges: buildStemChanges(parseStemChangingVerbs(readJson('stem-changing-verbs.json'))),
    regularEndings: REGULAR_ENDINGS,
    infinitiveEndings: [...FUTURE_ENDINGS, ...CONDITIONAL_ENDINGS],
    irregularFutureStems: [
      { stemTail: 'dr', infinitiveTails: ['er', 'ir'] },  // tendr, saldr
      { stemTail: 'br', infinitiveTails: ['ber'] },       // habr, cabr
      { stemTail: 'rr', infinitiveTails: ['rer'] },       // querr
      { stemTail: 'odr', infinitiveTails: ['oder'] },     // podr
    ],
    stemChangeEndings: STEM_CHANGE_ENDINGS,
    velarInsertionEndings: ['o', 'a', 'as', 'amos', 'áis', 'an'],
    raisedVariantEndings: ['ió', 'ieron', 'iendo'],
    orthographicAlternations: [
      { surface: 'c', infinitive: 'z', endings: FRONT_VOWEL_ENDINGS, verbClass: 'ar' },   // organice
      { surface: 'gu', infinitive: 'g', endings: FRONT_VOWEL_ENDINGS, verbClass: 'ar' },  // llegue
      { surface: 'qu', infinitive: 'c', endings: FRONT_VOWEL_ENDINGS, verbClass: 'ar' },  // busque
    ],
    prefixes: VERB_PREFIXES,
    clitics: CLITIC_PRONOUNS,
    monosyllabicImperatives: MONOSYLLABIC_IMPERATIVES,
    pronominalSuffix: 'se',
  };
}

export const getSpanishConjugation = defineTable('spanishConjugation', createSpanishConjugation);
