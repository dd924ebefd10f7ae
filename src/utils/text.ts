/**
 * First capture group of `re` in `text`, or undefined when there is no match.
 */
export function searchText(text: string, re: RegExp): string | undefined {
  const m = re.exec(text);
  if (!m || m[1] === undefined) return undefined;
  return m[1];
}

export function uniq<T>(items: Iterable<T>): T[] {
  return Array.from(new Set(items));
}
