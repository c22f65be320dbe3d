import { normalizeSubjectCode, SUBJECT_CODES, SubjectCodeTable, SubjectId } from "../subjects/subjectCodes";
import { CatalogEntry, SelectedEntry } from "../types";

const REQUIRED_EXTENSION = ".h5";
const REQUIRED_TOKENS = ["attention", "vc"];

export function looksLikeAttentionFile(name: string): boolean {
  const lowered = name.toLowerCase();
  return lowered.endsWith(REQUIRED_EXTENSION) && REQUIRED_TOKENS.every((token) => lowered.includes(token));
}

export function selectCatalogEntries(
  entries: readonly CatalogEntry[],
  wanted: ReadonlySet<SubjectId>,
  table: SubjectCodeTable = SUBJECT_CODES,
): SelectedEntry[] {
  const selected: SelectedEntry[] = [];
  for (const entry of entries) {
    if (!looksLikeAttentionFile(entry.name)) {
      continue;
    }
    const subject = normalizeSubjectCode(entry.name, table);
    if (!subject || !wanted.has(subject)) {
      continue;
    }
    const shortCode = table.shortCodeFor(subject);
    if (!shortCode) {
      continue;
    }
    selected.push({ ...entry, subject, shortCode });
  }
  return selected;
}
