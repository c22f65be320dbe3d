import { SubjectValidationError } from "../core/errors";

export type ShortCode = "S1" | "S2" | "S3" | "S4";
export type SubjectId = "sub-01" | "sub-04" | "sub-06" | "sub-07";

export class SubjectCodeTable {
  private readonly shortToSubject: ReadonlyMap<string, SubjectId>;
  private readonly subjectToShort: ReadonlyMap<string, ShortCode>;
  private readonly subjectIds: ReadonlyMap<string, SubjectId>;

  private constructor(pairs: ReadonlyArray<readonly [ShortCode, SubjectId]>) {
    this.shortToSubject = new Map<string, SubjectId>(pairs);
    this.subjectToShort = new Map<string, ShortCode>(pairs.map(([short, subject]) => [subject, short]));
    this.subjectIds = new Map<string, SubjectId>(pairs.map(([, subject]) => [subject, subject]));
    Object.freeze(this);
  }

  static of(pairs: ReadonlyArray<readonly [ShortCode, SubjectId]>): SubjectCodeTable {
    return new SubjectCodeTable(pairs);
  }

  subjectFor(shortCode: string): SubjectId | undefined {
    return this.shortToSubject.get(shortCode);
  }

  shortCodeFor(subject: string): ShortCode | undefined {
    return this.subjectToShort.get(subject);
  }

  lookupSubject(value: string): SubjectId | undefined {
    return this.subjectIds.get(value);
  }

  shortCodes(): ShortCode[] {
    return [...this.subjectToShort.values()];
  }

  subjects(): SubjectId[] {
    return [...this.shortToSubject.values()].sort();
  }

  shortToSubjectRecord(): Record<string, SubjectId> {
    return Object.fromEntries(this.shortToSubject);
  }

  subjectToShortRecord(): Record<string, ShortCode> {
    return Object.fromEntries(this.subjectToShort);
  }
}

export const SUBJECT_CODES = SubjectCodeTable.of([
  ["S1", "sub-06"],
  ["S2", "sub-07"],
  ["S3", "sub-04"],
  ["S4", "sub-01"],
]);

const SUBJECT_PATTERN = /sub[-_]?0?([1-9]\d?)/;

export function normalizeSubjectCode(raw: string, table: SubjectCodeTable = SUBJECT_CODES): SubjectId | undefined {
  const match = SUBJECT_PATTERN.exec(raw.trim().toLowerCase());
  if (!match) {
    return undefined;
  }
  const candidate = `sub-${match[1].padStart(2, "0")}`;
  return table.lookupSubject(candidate);
}

export function resolveSubjects(specs: readonly string[], table: SubjectCodeTable = SUBJECT_CODES): SubjectId[] {
  if (specs.length === 0) {
    return table.subjects();
  }

  const resolved = new Set<SubjectId>();
  for (const spec of specs) {
    const subject = table.subjectFor(spec.trim().toUpperCase()) ?? normalizeSubjectCode(spec, table);
    if (!subject) {
      throw new SubjectValidationError(spec);
    }
    resolved.add(subject);
  }
  return [...resolved].sort();
}
