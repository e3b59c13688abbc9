/**
 * Catalog order for codes of one department+semester. Shorter codes sort first,
 * so once a sequence widens past 99 (`CS1100`) it still follows `CS199`.
 */
export const compareSubjectCodes = (a: string, b: string): number => {
  if (a.length !== b.length) return a.length - b.length;
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

export const subjectCodePrefix = (department: string, semester: number): string =>
  `${department.toUpperCase()}${semester}`;

const sequenceOf = (code: string, prefix: string): number | null => {
  const suffix = code.slice(prefix.length);
  return code.startsWith(prefix) && /^\d+$/.test(suffix) ? parseInt(suffix, 10) : null;
};

/**
 * Next code for a department+semester. Only codes under the pair's own prefix
 * count, so a subject moved in from another pair never resets the sequence.
 * Sequences start at 1 and are not capped.
 */
export function nextSubjectCode(department: string, semester: number, existingCodes: readonly string[]): string {
  const prefix = subjectCodePrefix(department, semester);

  const issued = existingCodes.flatMap((code) => {
    const seq = sequenceOf(code, prefix);
    return seq === null ? [] : [seq];
  });
  const seq = issued.length > 0 ? Math.max(...issued) + 1 : 1;

  return `${prefix}${String(seq).padStart(2, '0')}`;
}
