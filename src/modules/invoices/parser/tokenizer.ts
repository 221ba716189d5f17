/**
 * Page segmentation.
 *
 * Every page of the invoice layout starts with the same identification strip, closed by
 * `Invoice #`. The first page additionally carries the address block closed by `Currency`.
 * Everything below those markers is one field per line.
 */

export const SEPARATORS = {
  header: 'Invoice #\n',
  headerBlock: 'Currency\n',
  line: '\n',
} as const;

export const TOTALS_MARKER = 'Total Units';

export interface PageSections {
  hasHeaderMarker: boolean;
  /** Text before the `Invoice #` marker; empty when the marker is missing. */
  preamble: string;
  /** Text after the `Invoice #` marker, or the whole page when it is missing. */
  remainder: string;
  /** Address block between the two markers; null unless `Currency` follows `Invoice #`. */
  addressSection: string | null;
  /** Commercial terms and line items. */
  bodySection: string;
}

export const splitBlocks = (text: string, separator: string = SEPARATORS.line): string[] =>
  text.split(separator);

export const splitOnce = (text: string, separator: string): [string, string] | null => {
  const at = text.indexOf(separator);
  if (at < 0) {
    return null;
  }
  return [text.slice(0, at), text.slice(at + separator.length)];
};

export const segmentPage = (text: string): PageSections => {
  const headerSplit = splitOnce(text, SEPARATORS.header);
  const preamble = headerSplit ? headerSplit[0] : '';
  const remainder = headerSplit ? headerSplit[1] : text;

  const blockSplit = headerSplit ? splitOnce(remainder, SEPARATORS.headerBlock) : null;

  return {
    hasHeaderMarker: headerSplit !== null,
    preamble,
    remainder,
    addressSection: blockSplit ? blockSplit[0] : null,
    bodySection: blockSplit ? blockSplit[1] : remainder,
  };
};

/** Cuts the body before the totals block so that line items and totals never overlap. */
export const itemRegion = (bodySection: string): string => {
  const at = bodySection.indexOf(TOTALS_MARKER);
  return at < 0 ? bodySection : bodySection.slice(0, at);
};
