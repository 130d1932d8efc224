export function normalizeBookName(book: string): string {
  return book.replace(/\s+/g, " ").trim();
}

export function formatReference(verse: { book: string; chapter: number; verseNumber: number }): string {
  return `${verse.book} ${verse.chapter}:${verse.verseNumber}`;
}

export function isSameChapter(
  a: { book: string; chapter: number },
  b: { book: string; chapter: number },
): boolean {
  return a.book === b.book && a.chapter === b.chapter;
}
