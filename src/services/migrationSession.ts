import { v4 as uuidv4 } from 'uuid';
import type { ParsedSource } from '../parsers/types.js';
import type { MappingSet, MatchCandidate, PayloadBatch, RowError, TableMapping, TargetSchema, ValidationResult } from '../types.js';
import { EndpointResolver, DEFAULT_BATCH_SIZE } from './endpointResolver.js';
import { errorReportLog } from './errorReporting.js';
import { FuzzyMatcher } from './fuzzyMatcher.js';
import { MappingBuilder, type MappingEdit } from './mappingBuilder.js';
import { SchemaRegistry } from './schemaRegistry.js';
import { createDefaultTransformers, type TransformerLookup } from './transformers.js';
import { ValidationGate } from './validationGate.js';

export interface SubmitResult {
  ok: boolean;
  /** Indices into `batch.records` the ERP rejected. */
  failedIndices: number[];
  message?: string;
}

/** The ERP HTTP client seen from the engine: accepts one finished batch at a time. */
export interface PayloadSink {
  submitBatch(batch: PayloadBatch): Promise<SubmitResult>;
}

export interface TableSubmissionReport {
  sourceTable: string;
  endpoint?: string;
  outcome: 'submitted' | 'skipped' | 'blocked' | 'cancelled';
  batches: number;
  /** Records shaped into batches; equals what a live run would send. */
  recordsShaped: number;
  recordsSubmitted: number;
  recordsFailed: number;
  rowErrors: RowError[];
  messages: string[];
  /** Ids of the error reports logged for this table's batches. */
  reportIds: string[];
}

export interface SubmissionReport {
  sessionId: string;
  dryRun: boolean;
  cancelled: boolean;
  tables: TableSubmissionReport[];
}

export interface SubmitOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
}

export interface MigrationSessionOptions {
  batchSize?: number;
  transformers?: TransformerLookup;
  connectionId?: string;
}

/**
 * One migration run: the parsed source, the target schema, and the mapping
 * under review. Wires registry, matcher, builder, gate and resolver together.
 */
export class MigrationSession {
  readonly id = uuidv4();
  readonly createdAt = new Date().toISOString();
  readonly connectionId?: string;
  readonly registry = new SchemaRegistry();
  readonly matcher: FuzzyMatcher;
  readonly builder: MappingBuilder;
  readonly gate: ValidationGate;
  readonly resolver: EndpointResolver;
  private lastValidation: ValidationResult | null = null;

  constructor(
    private readonly source: ParsedSource,
    target: TargetSchema,
    options: MigrationSessionOptions = {},
  ) {
    const transformers = options.transformers ?? createDefaultTransformers();
    const schema = source.discover();
    this.connectionId = options.connectionId;
    this.registry.registerSource(schema);
    this.registry.loadTarget(target);
    this.matcher = new FuzzyMatcher(this.registry);
    this.builder = new MappingBuilder(this.registry, this.matcher);
    this.gate = new ValidationGate(this.registry, transformers);
    this.resolver = new EndpointResolver(this.registry, transformers, {
      batchSize: options.batchSize ?? DEFAULT_BATCH_SIZE,
    });
    this.builder.autoMap();
    console.log(`[MigrationSession] ${this.id} created with ${schema.tables.length} source tables`);
  }

  mappingSet(): MappingSet {
    return this.builder.current();
  }

  candidates(table: string, column?: string, endpoint?: string): MatchCandidate[] {
    return this.builder.candidatesFor(table, column, endpoint);
  }

  edit(table: string, edit: MappingEdit): TableMapping {
    return this.builder.applyEdit(table, edit);
  }

  validate(): ValidationResult {
    const result = this.gate.validate(this.builder.current());
    this.builder.load(result.mappingSet);
    this.lastValidation = result;
    return result;
  }

  latestValidation(): ValidationResult | null {
    return this.lastValidation;
  }

  /**
   * Replaces the mapping with an exported one. Statuses in the file are not
   * trusted: the set goes through the gate against this session's schemas.
   */
  importMappingSet(set: MappingSet): ValidationResult {
    this.builder.load(set);
    return this.validate();
  }

  /** Batches for every validated table, built lazily from the parsed rows. */
  batches(): Generator<PayloadBatch> {
    return this.resolver.resolveAll(this.builder.current(), (table) => this.source.rows(table));
  }

  /**
   * Submits validated tables batch by batch. A dry run shapes every batch
   * without calling the sink. Cancellation is checked before each table and
   * between batches.
   */
  async submit(sink: PayloadSink | null, options: SubmitOptions = {}): Promise<SubmissionReport> {
    const dryRun = options.dryRun ?? sink === null;
    const mappingSet = this.builder.current();
    const reports: TableSubmissionReport[] = [];
    let cancelled = false;

    for (const table of mappingSet.tables) {
      const report: TableSubmissionReport = {
        sourceTable: table.sourceTable,
        endpoint: table.endpoint,
        outcome: table.skipped ? 'skipped' : table.status === 'validated' ? 'submitted' : 'blocked',
        batches: 0,
        recordsShaped: 0,
        recordsSubmitted: 0,
        recordsFailed: 0,
        rowErrors: [],
        messages: [],
        reportIds: [],
      };
      reports.push(report);
      if (report.outcome !== 'submitted') continue;
      if (cancelled || options.signal?.aborted) {
        cancelled = true;
        report.outcome = 'cancelled';
        continue;
      }

      for (const batch of this.resolver.resolve(table, this.source.rows(table.sourceTable))) {
        if (options.signal?.aborted) {
          cancelled = true;
          report.outcome = 'cancelled';
          console.warn(`[MigrationSession] ${this.id} cancelled before batch ${batch.index} of ${table.sourceTable}`);
          break;
        }
        report.batches += 1;
        report.recordsShaped += batch.records.length;
        report.rowErrors.push(...batch.errors);
        report.recordsFailed += batch.errors.length;

        if (dryRun || !sink || batch.records.length === 0) continue;

        const result = await this.submitBatch(sink, batch);
        report.recordsSubmitted += batch.records.length - result.failedIndices.length;
        report.recordsFailed += result.failedIndices.length;
        if (result.message) report.messages.push(result.message);
        if (result.reportId) report.reportIds.push(result.reportId);
      }
    }

    console.log(
      `[MigrationSession] ${this.id} ${dryRun ? 'dry run' : 'submission'} finished: ` +
        reports.map((r) => `${r.sourceTable}=${r.outcome}`).join(', '),
    );
    return { sessionId: this.id, dryRun, cancelled, tables: reports };
  }

  private async submitBatch(sink: PayloadSink, batch: PayloadBatch): Promise<SubmitResult & { reportId?: string }> {
    const scope = { source: 'submission', sessionId: this.id, table: batch.sourceTable, batchId: batch.id, endpoint: batch.endpoint } as const;
    try {
      const result = await sink.submitBatch(batch);
      if (result.ok) return result;
      const report = errorReportLog().record({
        ...scope,
        severity: 'warning',
        code: 'BATCH_REJECTED',
        message: result.message ?? 'batch rejected',
        outcome: 'rejected',
        failedRecords: result.failedIndices.length,
      });
      return { ...result, reportId: report.id };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const report = errorReportLog().record({
        ...scope,
        severity: 'error',
        code: 'BATCH_SUBMIT_FAILED',
        message,
        outcome: 'failed',
        failedRecords: batch.records.length,
      });
      console.error(`[MigrationSession] batch ${batch.id} of ${batch.sourceTable} failed (report ${report.id}): ${message}`);
      return {
        ok: false,
        failedIndices: batch.records.map((_, i) => i),
        message: `Batch ${batch.index} failed: ${message}`,
        reportId: report.id,
      };
    }
  }
}
