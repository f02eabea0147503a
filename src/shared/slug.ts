/**
 * URL- and filename-safe slugs.
 */

/**
 * Lowercase ASCII slug: accents folded, runs of anything else collapsed to a
 * single hyphen, no leading or trailing hyphen.
 *
 * @example slugify('Crème Brûlée: 5 Tips!') // 'creme-brulee-5-tips'
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/** Local calendar date as `YYYYMMDD`, used to stamp output filenames. */
export function dateStamp(date: Date = new Date()): string {
  const yyyy = date.getFullYear().toString();
  const mm = (date.getMonth() + 1).toString().padStart(2, '0');
  const dd = date.getDate().toString().padStart(2, '0');
  return `${yyyy}${mm}${dd}`;
}

/** Local date and time as `YYYYMMDD_HHMMSS`. */
export function dateTimeStamp(date: Date = new Date()): string {
  const hh = date.getHours().toString().padStart(2, '0');
  const mi = date.getMinutes().toString().padStart(2, '0');
  const ss = date.getSeconds().toString().padStart(2, '0');
  return `${dateStamp(date)}_${hh}${mi}${ss}`;
}
