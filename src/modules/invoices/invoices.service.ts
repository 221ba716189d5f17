import { Inject, Injectable, Logger } from '@nestjs/common';
import { ClientProxy, RpcException } from '@nestjs/microservices';

import { InvoiceParserEvents, NATS_SERVICE, PARSER_OPTIONS } from '../../config/services';
import { InvoiceFormat, ParseBatchDto, ParseInvoiceDto } from './dto';
import type { ParsedInvoice, ParseFailure, ParseOutcome, ParserOptions } from './interfaces';
import { InvoiceAssembler } from './parser/invoice-assembler';
import { InvoicePayload, InvoiceRows, toInvoicePayload, toInvoiceRows } from './parser/invoice-rows';

export type ParseReply = InvoicePayload | InvoiceRows;

export type BatchEntry =
  | { index: number; documentId: string | null; ok: true; result: ParseReply }
  | { index: number; documentId: string | null; ok: false; failure: ParseFailure };

export interface InvoiceParsedEvent {
  documentId: string | null;
  invoiceId: string;
  lineItemCount: number;
  warningCount: number;
  hasSummary: boolean;
}

@Injectable()
export class InvoicesService {
  private readonly logger = new Logger(InvoicesService.name);
  private parsed = 0;
  private failed = 0;

  constructor(
    @Inject(NATS_SERVICE) private readonly client: ClientProxy,
    private readonly assembler: InvoiceAssembler,
    @Inject(PARSER_OPTIONS) private readonly options: ParserOptions,
  ) {}

  parse(payload: ParseInvoiceDto): ParseReply {
    try {
      const outcome = this.run(payload);
      if (!outcome.ok) {
        throw new RpcException({ status: 422, ...outcome.failure });
      }
      return this.reply(outcome.invoice, payload.format);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  parseBatch(payload: ParseBatchDto): BatchEntry[] {
    try {
      return payload.documents.map((document, index): BatchEntry => {
        const documentId = document.documentId ?? null;
        const outcome = this.run(document);
        return outcome.ok
          ? { index, documentId, ok: true, result: this.reply(outcome.invoice, document.format) }
          : { index, documentId, ok: false, failure: outcome.failure };
      });
    } catch (error) {
      throw this.handleError(error);
    }
  }

  health() {
    return {
      status: 'ok',
      parsed: this.parsed,
      failed: this.failed,
    };
  }

  private run(payload: ParseInvoiceDto): ParseOutcome {
    const documentId = payload.documentId ?? null;
    const outcome = this.assembler.assemble(payload.pages, {
      deliverySearchCap: this.options.deliverySearchCap,
      preferTableGrids: payload.preferTableGrids ?? this.options.preferTableGrids,
    });

    if (!outcome.ok) {
      this.failed += 1;
      this.logger.warn(
        `Document ${documentId ?? '(unnamed)'} rejected at ${outcome.failure.stage}: ${outcome.failure.message}`,
      );
      return outcome;
    }

    this.parsed += 1;
    const { invoice } = outcome;
    this.logger.log(
      `Document ${documentId ?? '(unnamed)'} parsed: invoice ${invoice.header.invoiceId}, ${invoice.lineItems.length} line item(s), ${invoice.warnings.length} warning(s)`,
    );

    const event: InvoiceParsedEvent = {
      documentId,
      invoiceId: invoice.header.invoiceId,
      lineItemCount: invoice.lineItems.length,
      warningCount: invoice.warnings.length,
      hasSummary: invoice.summary !== null,
    };
    this.client.emit(InvoiceParserEvents.parsed, event);

    return outcome;
  }

  private reply(invoice: ParsedInvoice, format: InvoiceFormat = 'structured'): ParseReply {
    return format === 'rows' ? toInvoiceRows(invoice) : toInvoicePayload(invoice);
  }

  private handleError(error: unknown): RpcException {
    if (error instanceof RpcException) {
      return error;
    }

    this.logger.error(error);
    return new RpcException({ status: 500, message: 'Internal server error' });
  }
}
