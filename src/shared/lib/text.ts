function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** First `length` UTF-16 units, one fewer when the cut would split a surrogate pair. */
export function sliceHead(text: string, length: number): string {
  if (length >= text.length) return text;
  const end = Math.max(0, length);
  return text.slice(0, isLowSurrogate(text.charCodeAt(end)) ? end - 1 : end);
}

/** Last `length` UTF-16 units, one fewer when the cut would split a surrogate pair. */
export function sliceTail(text: string, length: number): string {
  if (length >= text.length) return text;
  if (length <= 0) return '';
  const start = text.length - length;
  return text.slice(isLowSurrogate(text.charCodeAt(start)) ? start + 1 : start);
}
