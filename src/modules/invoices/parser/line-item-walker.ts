import { Injectable, Logger } from '@nestjs/common';

import { LineItemFields, ParseIssue, ParseIssueCode } from '../interfaces';
import { asDecimal, asInteger, asText, extractFromText, FIELD_PATTERNS } from './field-extractor';

export const DELIVERY_MARKER = 'Delivery #';
export const TARIFF_MARKER = 'Tariff code';
export const RDS_MARKER = 'RDS Certified';
export const ORIGIN_MARKER = 'Country of Origin';
export const DEFAULT_SEARCH_CAP = 100;

const TARIFF_CODE_LENGTH = 12;
const DELIVERY_ID_LENGTH = 10;

/** Family and origin share one line; either part is dropped when it does not apply. */
export type OriginToken =
  | { kind: 'both'; family: string; country: string }
  | { kind: 'family-only'; family: string }
  | { kind: 'country-only'; country: string }
  | { kind: 'neither' };

export type DeliverySearch =
  | { found: true; index: number }
  | { found: false; scanned: readonly [number, number] };

export interface WalkOptions {
  /** Upper bound on blocks scanned for the delivery line of the last item on a page. */
  searchCap?: number;
}

export interface WalkResult {
  items: LineItemFields[];
  issues: ParseIssue[];
}

export const findAnchors = (blocks: readonly string[]): number[] =>
  blocks.reduce<number[]>((anchors, block, index) => {
    if (FIELD_PATTERNS.styleColor.test(block)) {
      anchors.push(index);
    }
    return anchors;
  }, []);

export const decomposeOriginToken = (block: string): OriginToken => {
  const text = block.split(ORIGIN_MARKER)[0].trim();

  const both = /^(?<family>[A-Z]{3})\s+(?<country>[A-Z]{2})\b/.exec(text)?.groups;
  if (both) {
    return { kind: 'both', family: both['family'], country: both['country'] };
  }
  if (/^[A-Z]{3}$/.test(text)) {
    return { kind: 'family-only', family: text };
  }
  if (/^[A-Z]{2}$/.test(text)) {
    return { kind: 'country-only', country: text };
  }
  return { kind: 'neither' };
};

const originFields = (token: OriginToken) => {
  switch (token.kind) {
    case 'both':
      return { productFamily: token.family, countryOfOrigin: token.country };
    case 'family-only':
      return { productFamily: token.family, countryOfOrigin: null };
    case 'country-only':
      return { productFamily: null, countryOfOrigin: token.country };
    case 'neither':
      return { productFamily: null, countryOfOrigin: null };
  }
};

/**
 * Scans `[start, limit)` for the block carrying the delivery marker. Material and trim
 * descriptions have no fixed line count, so the offset differs for every item.
 */
export const searchDeliveryBlock = (
  blocks: readonly string[],
  start: number,
  limit: number,
): DeliverySearch => {
  const end = Math.min(limit, blocks.length);
  let offset = 0;
  let found = false;

  while (!found && start + offset < end) {
    if (blocks[start + offset].includes(DELIVERY_MARKER)) {
      found = true;
    } else {
      offset += 1;
    }
  }

  return found
    ? { found: true, index: start + offset }
    : { found: false, scanned: [start, Math.max(start, end)] };
};

const textBefore = (text: string, marker: string): string | null => {
  const at = text.indexOf(marker);
  return at < 0 ? null : text.slice(0, at).trim();
};

/** Accepts the last 12 characters of `text` only when they have the `NNNN.NN.NNNN` shape. */
export const tariffCodeFrom = (text: string): string | null => {
  const tail = text.trim().slice(-TARIFF_CODE_LENGTH);
  return FIELD_PATTERNS.tariffCode.test(tail) ? tail : null;
};

export const deliveryIdFrom = (text: string): string | null => {
  const tail = text.trim().slice(-DELIVERY_ID_LENGTH);
  return FIELD_PATTERNS.deliveryId.test(tail) ? tail : null;
};

/** Price and extended price are the last two tokens of the delivery line. */
export const pricesFrom = (text: string): { price: number | null; extPrice: number | null } => {
  const tokens = text.trim().split(/\s+/).filter(Boolean);
  if (tokens.length < 2) {
    return { price: null, extPrice: null };
  }
  return {
    price: asDecimal(tokens[tokens.length - 2]),
    extPrice: asDecimal(tokens[tokens.length - 1]),
  };
};

const joinBlocks = (blocks: readonly string[]) =>
  blocks
    .map((block) => block.trim())
    .filter(Boolean)
    .join(' ');

const otherDescrFrom = (region: string, tariffCode: string | null): string => {
  const cut =
    textBefore(region, TARIFF_MARKER) ?? textBefore(region, DELIVERY_MARKER) ?? region.trim();
  return tariffCode && cut.endsWith(tariffCode)
    ? cut.slice(0, -TARIFF_CODE_LENGTH).trim()
    : cut;
};

interface DeliveryFields {
  rdsCertified: boolean;
  tariffCode: string | null;
  deliveryId: string | null;
  price: number | null;
  extPrice: number | null;
}

const NO_DELIVERY: DeliveryFields = {
  rdsCertified: false,
  tariffCode: null,
  deliveryId: null,
  price: null,
  extPrice: null,
};

export const readDeliveryBlock = (block: string): DeliveryFields => {
  const afterMarker = block.slice(block.indexOf(DELIVERY_MARKER) + DELIVERY_MARKER.length).trim();
  const beforeTariff = textBefore(block, TARIFF_MARKER);
  const beforeDelivery = textBefore(block, DELIVERY_MARKER);

  return {
    rdsCertified: afterMarker.includes(RDS_MARKER),
    tariffCode: beforeTariff !== null ? tariffCodeFrom(beforeTariff) : null,
    deliveryId: beforeDelivery !== null ? deliveryIdFrom(beforeDelivery) : null,
    ...pricesFrom(afterMarker),
  };
};

/**
 * Turns every style-color anchor on a page into a line item. Size, quantity and origin sit
 * at fixed offsets from the anchor; the delivery line is found by a bounded search.
 */
@Injectable()
export class LineItemWalker {
  private readonly logger = new Logger(LineItemWalker.name);

  walk(pageIndex: number, blocks: readonly string[], options: WalkOptions = {}): WalkResult {
    const searchCap = options.searchCap ?? DEFAULT_SEARCH_CAP;
    const anchors = findAnchors(blocks);
    const items: LineItemFields[] = [];
    const issues: ParseIssue[] = [];

    anchors.forEach((anchor, position) => {
      const nextAnchor = anchors[position + 1];
      const item = this.readItem(pageIndex, blocks, anchor, nextAnchor, searchCap, issues);
      if (item) {
        items.push(item);
      }
    });

    this.logger.debug(
      `Page ${pageIndex}: ${items.length} line item(s) from ${anchors.length} anchor(s)`,
    );
    return { items, issues };
  }

  private readItem(
    pageIndex: number,
    blocks: readonly string[],
    anchor: number,
    nextAnchor: number | undefined,
    searchCap: number,
    issues: ParseIssue[],
  ): LineItemFields | null {
    const anchorText = blocks[anchor].replace(/\s*\bSize\s*$/, '');
    const styleColor = extractFromText<string | null>(anchorText, {
      field: 'styleColor',
      pattern: FIELD_PATTERNS.styleColor,
      coerce: asText,
      fallback: null,
    }).value;

    const qty = extractFromText<number | null>(blocks[anchor + 2] ?? '', {
      field: 'qty',
      pattern: /^\s*(?<value>\d+)\s*$/,
      coerce: asInteger,
      fallback: null,
    }).value;

    if (styleColor === null || qty === null) {
      const field = styleColor === null ? 'styleColor' : 'qty';
      const message = `Page ${pageIndex}: anchor at block ${anchor} dropped, ${field} is missing or malformed`;
      this.logger.warn(message);
      issues.push({ code: ParseIssueCode.FieldMalformed, pageIndex, field, message });
      return null;
    }

    const start = anchor + 4;
    const limit = Math.min(nextAnchor ?? blocks.length, start + searchCap);
    const search = searchDeliveryBlock(blocks, start, limit);

    let delivery = NO_DELIVERY;
    let materialEnd: number;
    let region: string;
    if (search.found) {
      delivery = readDeliveryBlock(blocks[search.index]);
      materialEnd = search.index;
      region = joinBlocks(blocks.slice(start, search.index + 1));
    } else {
      const message = `Page ${pageIndex}: no ${DELIVERY_MARKER} line for ${styleColor} within blocks ${search.scanned[0]}-${search.scanned[1]}`;
      this.logger.warn(message);
      issues.push({ code: ParseIssueCode.AnchorSearchExhausted, pageIndex, field: 'deliveryId', message });
      materialEnd = search.scanned[1];
      region = joinBlocks(blocks.slice(search.scanned[0], search.scanned[1]));
    }

    return {
      styleColor,
      styleColorDescr: this.descriptionFor(blocks, anchor, anchorText, styleColor, materialEnd),
      size: this.sizeFrom(blocks[anchor + 1] ?? ''),
      qty,
      ...originFields(decomposeOriginToken(blocks[anchor + 3] ?? '')),
      ...delivery,
      otherDescr: otherDescrFrom(region, delivery.tariffCode),
    };
  }

  private sizeFrom(block: string): string | null {
    const text = block.replace(/\b(?:Qty|Size)\b/g, '').trim();
    return FIELD_PATTERNS.size.exec(text)?.groups?.['value'] ?? null;
  }

  /**
   * The style name normally follows the code on the anchor line. Some layouts print it on
   * the second line of the material region instead.
   */
  private descriptionFor(
    blocks: readonly string[],
    anchor: number,
    anchorText: string,
    styleColor: string,
    materialEnd: number,
  ): string {
    const inline = anchorText.slice(anchorText.indexOf(styleColor) + styleColor.length).trim();
    if (inline) {
      return inline;
    }
    const fallback = anchor + 5;
    return fallback < materialEnd ? blocks[fallback].trim() : '';
  }
}
