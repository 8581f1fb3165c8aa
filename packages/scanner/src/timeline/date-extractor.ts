/**
 * OCRテキストからの日付抽出（正規表現のみ）
 */

export interface ExtractedDate {
  /** テキスト中の表記 */
  text: string;
  /** ISO形式（`1945` または `1945-05-08`） */
  parsed: string;
}

interface Hit extends ExtractedDate {
  start: number;
  end: number;
}

const YEAR = '(1\\d{3}|20\\d{2})';

const FULL_DATE_PATTERN = /(?<!\d)(\d{1,2})\.(\d{1,2})\.(\d{4})(?!\d)/g;
const ISO_DATE_PATTERN = /(?<!\d)(\d{4})-(\d{2})-(\d{2})(?!\d)/g;
const YEAR_RANGE_PATTERN = new RegExp(`(?<!\\d)${YEAR}\\s*[-–]\\s*${YEAR}(?!\\d)`, 'g');
const YEAR_PATTERN = new RegExp(`(?<!\\d)${YEAR}(?!\\d)`, 'g');

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function isValidDay(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

/**
 * 日付を抽出（出現順、同じ表記と解釈の重複は除く）
 * 完全な日付や年の範囲の一部になっている年は単独の年として数えない
 */
export function extractDates(text: string): ExtractedDate[] {
  const hits: Hit[] = [];

  const overlaps = (start: number, end: number) =>
    hits.some((hit) => start < hit.end && end > hit.start);

  const collect = (pattern: RegExp, toParsed: (groups: string[]) => string | null): void => {
    for (const match of text.matchAll(pattern)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (overlaps(start, end)) {
        continue;
      }
      const parsed = toParsed(match.slice(1).map((group) => group ?? ''));
      if (parsed) {
        hits.push({ text: match[0], parsed, start, end });
      }
    }
  };

  // DD.MM.YYYY
  collect(FULL_DATE_PATTERN, ([day, month, year]) => {
    const y = Number(year);
    const m = Number(month);
    const d = Number(day);
    return isValidDay(y, m, d) ? `${year}-${pad(m)}-${pad(d)}` : null;
  });

  // YYYY-MM-DD
  collect(ISO_DATE_PATTERN, ([year, month, day]) =>
    isValidDay(Number(year), Number(month), Number(day)) ? `${year}-${month}-${day}` : null
  );

  // YYYY-YYYY（開始年）
  collect(YEAR_RANGE_PATTERN, ([from, to]) => (Number(from) <= Number(to) ? from : null));

  // YYYY
  collect(YEAR_PATTERN, ([year]) => year);

  const seen = new Set<string>();
  return hits
    .sort((a, b) => a.start - b.start)
    .filter((hit) => {
      const key = `${hit.text}\u0000${hit.parsed}`;
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    })
    .map(({ text: hitText, parsed }) => ({ text: hitText, parsed }));
}
