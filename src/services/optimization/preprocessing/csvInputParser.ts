/**
 * CSV Input Parser
 *
 * Reads rosters exported from a spreadsheet. The first row is a header;
 * columns are read by position.
 *
 * Partners:  first, last, score[, "First Last, First Last" requested partners]
 * Immersion: first, last, program, option 1, option 2, ...
 */

import Papa from 'papaparse';
import type { ImmersionStudent, PartnerPreferences, PartnerStudent } from '../types';
import { InputShapeError } from '../errors';
import { createImmersionStudent, createPartnerStudent, displayName } from '../students';
import { DEFAULT_PARTNER_BONUS } from '@/_domain';

export interface PartnerCsvOptions {
  /** Matrix entry for each requested pair (negative = bonus) */
  partnerBonus?: number;
}

export interface PartnerCsvResult {
  students: PartnerStudent[];
  preferences: PartnerPreferences;
}

export interface ImmersionCsvOptions {
  /** Converts one preference cell; defaults to a plain number parse */
  parseValue?: (raw: string) => number;
}

export interface ImmersionCsvResult {
  students: ImmersionStudent[];
  /** One n × options matrix for the week described by the file */
  preferences: number[][];
  /** Option names from the header */
  optionLabels: string[];
}

/**
 * Parse CSV text into trimmed rows (header first)
 */
function parseRows(text: string, minColumns: number, label: string): { header: string[]; rows: string[][] } {
  const results = Papa.parse<string[]>(text.trim(), {
    header: false,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  if (results.errors.length > 0) {
    const first = results.errors[0];
    throw new InputShapeError(`${label} CSV: ${first.message}${first.row !== undefined ? ` (row ${first.row + 1})` : ''}`);
  }

  const [header, ...rows] = results.data.map(row => row.map(cell => cell.trim()));
  if (!header || header.length < minColumns) {
    throw new InputShapeError(`${label} CSV needs a header with at least ${minColumns} columns`);
  }
  if (rows.length === 0) {
    throw new InputShapeError(`${label} CSV has no student rows`);
  }
  return { header, rows };
}

function parseNumber(raw: string): number {
  return raw === '' ? Number.NaN : Number(raw);
}

/**
 * Parse a partner roster. Requested partners are matched by "First Last"
 * and written symmetrically into the preference matrix.
 */
export function parsePartnerCsv(text: string, options: PartnerCsvOptions = {}): PartnerCsvResult {
  const partnerBonus = options.partnerBonus ?? DEFAULT_PARTNER_BONUS;
  const { rows } = parseRows(text, 3, 'Partner');

  const students: PartnerStudent[] = [];
  const requests: Array<{ index: number; names: string }> = [];
  const indexByName = new Map<string, number>();

  rows.forEach((row, r) => {
    if (row.length < 3) {
      throw new InputShapeError(`Partner CSV row ${r + 2} has ${row.length} columns, expected at least 3`);
    }
    const [firstName, lastName, rawScore, partners] = row;
    const score = parseNumber(rawScore);
    if (Number.isNaN(score)) {
      throw new InputShapeError(`Partner CSV row ${r + 2}: score "${rawScore}" is not a number`);
    }
    const student = createPartnerStudent(firstName, lastName, score);
    indexByName.set(displayName(student), students.length);
    if (partners) {
      requests.push({ index: students.length, names: partners });
    }
    students.push(student);
  });

  const preferences: PartnerPreferences = students.map(() => students.map(() => 0));
  for (const { index, names } of requests) {
    for (const name of names.split(',').map(n => n.trim()).filter(n => n !== '')) {
      const partner = indexByName.get(name);
      if (partner === undefined) {
        throw new InputShapeError(`Unknown partner "${name}" requested by ${displayName(students[index])}`);
      }
      if (partner === index) continue;
      preferences[index][partner] = partnerBonus;
      preferences[partner][index] = partnerBonus;
    }
  }

  console.log(`[CSVParser] Parsed ${students.length} partner students, ${requests.length} with partner requests`);
  return { students, preferences };
}

/**
 * Parse one week of an immersion roster
 */
export function parseImmersionCsv(text: string, options: ImmersionCsvOptions = {}): ImmersionCsvResult {
  const parseValue = options.parseValue ?? parseNumber;
  const { header, rows } = parseRows(text, 4, 'Immersion');
  const optionLabels = header.slice(3);

  const students: ImmersionStudent[] = [];
  const preferences: number[][] = [];

  rows.forEach((row, r) => {
    if (row.length !== header.length) {
      throw new InputShapeError(
        `Immersion CSV row ${r + 2} has ${row.length - 3} option columns, expected ${optionLabels.length}`
      );
    }
    const [firstName, lastName, program, ...cells] = row;
    students.push(createImmersionStudent(firstName, lastName, program));
    preferences.push(cells.map((cell, k) => {
      const value = parseValue(cell);
      if (Number.isNaN(value)) {
        throw new InputShapeError(`Immersion CSV row ${r + 2}, option "${optionLabels[k]}": "${cell}" is not a number`);
      }
      return value;
    }));
  });

  console.log(`[CSVParser] Parsed ${students.length} immersion students, ${optionLabels.length} options`);
  return { students, preferences, optionLabels };
}
