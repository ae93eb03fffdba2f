const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Cuts `text` to at most `maxLength` UTF-16 code units without splitting a grapheme cluster.
 * Text made of single-unit graphemes comes back exactly `maxLength` long.
 */
export function truncateText(text: string, maxLength: number): string {
  if (maxLength <= 0) {
    return "";
  }
  if (text.length <= maxLength) {
    return text;
  }

  let end = 0;
  for (const { segment } of graphemeSegmenter.segment(text)) {
    if (end + segment.length > maxLength) {
      break;
    }
    end += segment.length;
  }
  return text.slice(0, end);
}
