import { Injectable, Logger } from '@nestjs/common';

import {
  InvoiceHeader,
  LineItemFields,
  ParseIssue,
  ParseIssueCode,
  ParseOutcome,
  ParsedInvoice,
  RawPage,
  SummaryRecord,
} from '../interfaces';
import { HeaderResolver, createDefaultHeader } from './header-resolver';
import { DEFAULT_SEARCH_CAP, LineItemWalker } from './line-item-walker';
import { classifyPage, PageClassification } from './page-classifier';
import { SummaryResolver } from './summary-resolver';
import { itemRegion, splitBlocks } from './tokenizer';

export interface AssembleOptions {
  deliverySearchCap?: number;
  preferTableGrids?: boolean;
}

interface AssemblyState {
  header: InvoiceHeader | null;
  /** Set once a page with the address block has been read. */
  firstPageSeen: boolean;
  drafts: LineItemFields[];
  summary: SummaryRecord | null;
  warnings: ParseIssue[];
  done: boolean;
}

type PageStep = { kind: 'continue' } | { kind: 'fail'; pageIndex: number; message: string };

const CONTINUE: PageStep = { kind: 'continue' };

/**
 * Folds the pages of one document into a single invoice. All state lives in the accumulator
 * created per call, so one instance can serve any number of documents.
 */
@Injectable()
export class InvoiceAssembler {
  private readonly logger = new Logger(InvoiceAssembler.name);

  constructor(
    private readonly headerResolver: HeaderResolver,
    private readonly lineItemWalker: LineItemWalker,
    private readonly summaryResolver: SummaryResolver,
  ) {}

  assemble(pages: readonly RawPage[], options: AssembleOptions = {}): ParseOutcome {
    const state: AssemblyState = {
      header: null,
      firstPageSeen: false,
      drafts: [],
      summary: null,
      warnings: [],
      done: false,
    };

    for (const [position, page] of pages.entries()) {
      if (state.done) {
        this.ambiguous(state, page.pageIndex, 'page follows the remittance page and is ignored');
        continue;
      }

      const step = this.applyPage(state, position, page, options);
      if (step.kind === 'fail') {
        this.logger.warn(step.message);
        return {
          ok: false,
          failure: {
            stage: 'classify',
            code: ParseIssueCode.HeaderReappeared,
            pageIndex: step.pageIndex,
            message: step.message,
          },
          warnings: state.warnings,
        };
      }
    }

    return { ok: true, invoice: this.finish(state) };
  }

  private applyPage(
    state: AssemblyState,
    position: number,
    page: RawPage,
    options: AssembleOptions,
  ): PageStep {
    const { role, sections } = classifyPage(page.text);
    const { pageIndex } = page;

    if (role.kind === 'first') {
      if (state.firstPageSeen) {
        return {
          kind: 'fail',
          pageIndex,
          message: `Page ${pageIndex}: header block appears again after invoice ${state.header?.invoiceId ?? ''}`,
        };
      }
      if (role.alsoLast && position > 0) {
        this.ambiguous(state, pageIndex, 'header and remittance on a later page, read as a continuation');
        this.walk(state, pageIndex, sections.bodySection, options);
        return CONTINUE;
      }
      if (position > 0) {
        this.ambiguous(state, pageIndex, 'header block found after the first page');
      }
      this.readFirstPage(state, page, { role, sections }, options);
      return CONTINUE;
    }

    // A leading page may carry the identification strip without the address block.
    if (position === 0 && sections.hasHeaderMarker) {
      this.resolveHeader(state, page, { role, sections }, options);
    }

    if (role.kind === 'last') {
      this.walk(state, pageIndex, itemRegion(sections.bodySection), options);
      this.readSummary(state, pageIndex, sections.bodySection);
      return CONTINUE;
    }

    if (role.unmarked) {
      this.ambiguous(state, pageIndex, 'page carries no invoice header strip');
    }
    this.walk(state, pageIndex, sections.bodySection, options);
    return CONTINUE;
  }

  private resolveHeader(
    state: AssemblyState,
    page: RawPage,
    { sections }: PageClassification,
    options: AssembleOptions,
  ) {
    const { header, issues } = this.headerResolver.resolve(page.pageIndex, sections, {
      tableGrids: page.tableGrids,
      preferTableGrids: options.preferTableGrids,
    });
    state.header = header;
    state.warnings.push(...issues);
  }

  private readFirstPage(
    state: AssemblyState,
    page: RawPage,
    classification: PageClassification,
    options: AssembleOptions,
  ) {
    const { role, sections } = classification;
    this.resolveHeader(state, page, classification, options);
    state.firstPageSeen = true;

    const alsoLast = role.kind === 'first' && role.alsoLast;
    const body = alsoLast ? itemRegion(sections.bodySection) : sections.bodySection;
    this.walk(state, page.pageIndex, body, options);

    if (alsoLast) {
      this.readSummary(state, page.pageIndex, sections.bodySection);
    }
  }

  private walk(state: AssemblyState, pageIndex: number, body: string, options: AssembleOptions) {
    const { items, issues } = this.lineItemWalker.walk(pageIndex, splitBlocks(body), {
      searchCap: options.deliverySearchCap ?? DEFAULT_SEARCH_CAP,
    });
    state.drafts.push(...items);
    state.warnings.push(...issues);
  }

  private readSummary(state: AssemblyState, pageIndex: number, body: string) {
    const { summary, issues } = this.summaryResolver.resolve(pageIndex, body);
    state.summary = summary;
    state.warnings.push(...issues);
    state.done = true;
  }

  private ambiguous(state: AssemblyState, pageIndex: number, detail: string) {
    const message = `Page ${pageIndex}: ${detail}`;
    this.logger.warn(message);
    state.warnings.push({ code: ParseIssueCode.ClassificationAmbiguous, pageIndex, message });
  }

  private finish(state: AssemblyState): ParsedInvoice {
    let header = state.header;
    if (header === null) {
      const message = 'No page carried the invoice header block, header left at defaults';
      this.logger.warn(message);
      state.warnings.push({ code: ParseIssueCode.HeaderMissing, pageIndex: null, message });
      header = createDefaultHeader();
    }

    const bound = header;
    const lineItems = state.drafts.map((draft) => ({ ...draft, header: bound }));

    if (lineItems.length === 0) {
      const message = 'Document produced no line items';
      this.logger.warn(message);
      state.warnings.push({ code: ParseIssueCode.NoLineItems, pageIndex: null, message });
    }

    return { header, lineItems, summary: state.summary, warnings: state.warnings };
  }
}
