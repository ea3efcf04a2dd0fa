export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

export const limitToSentences = (value: string, maxSentences: number): string => {
  const text = normalizeWhitespace(value);

  if (!text || maxSentences <= 0) {
    return '';
  }

  const sentences =
    text.match(/[^.!?]+(?:[.!?]+|$)/g)?.map((sentence) => sentence.trim()).filter(Boolean) ?? [];

  if (sentences.length === 0) {
    return text;
  }

  return sentences.slice(0, maxSentences).join(' ').trim();
};

/** Replaces `{name}` placeholders; unknown placeholders are left as-is. */
export const fillTemplate = (template: string, values: Record<string, string>): string => {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
};

export const humanize = (value: string): string => value.replace(/_/g, ' ');
