import { EngineConfig } from '../config';
import { addUtcDays, Clock } from '../domain-types';
import { IdentityService } from '../domain/identity/identity-logic';
import { Application, Award, Borrower, NewBorrower } from '../domain/application/application-types';
import {
  BorrowerOptedOutError,
  describeError,
  DuplicateAwardError,
  SkippedAwardError,
  SourceFormatError,
  UniqueViolationError,
  UpstreamHttpError,
} from '../errors';
import { ApplicationFactory } from '../application/application-factory';
import { NotificationDispatcher } from '../application/notification-dispatcher';
import { LifecycleStore, StoreTransaction } from '../store/lifecycle-store';
import { AwardSource, RawRecord } from './award-source';
import {
  assertAwardRecordShape,
  getSourceContractId,
  getSupplierId,
  mapAwardRecord,
  mapBorrowerRecord,
  mapPreviousContractRecord,
  mergeBorrowerFields,
  selectBorrowerEmail,
  selectBorrowerRecord,
} from './award-mappers';
import { defaultSleep, Sleep, withRetry } from './http-retry';

export interface IngestionSummary {
  fetched: number;
  created: number;
  skipped: number;
  failed: number;
}

export interface IngestionWindow {
  fromDate?: Date;
  untilDate?: Date;
}

export interface AwardIngestorDeps {
  store: LifecycleStore;
  source: AwardSource;
  identity: IdentityService;
  factory: ApplicationFactory;
  dispatcher: NotificationDispatcher;
  config: Pick<EngineConfig, 'awardSource' | 'quiet'>;
  clock: Clock;
  sleep?: Sleep;
}

type RecordOutcome = 'created' | 'skipped' | 'failed';

// Re-reading the last day catches records published late within it
const WATERMARK_OVERLAP_DAYS = 1;

/**
 * Pulls new procurement awards from the open-data source and turns each one
 * into a borrower invitation. Each record commits or rolls back on its own.
 */
export class AwardIngestor {
  private sleep: Sleep;

  constructor(private deps: AwardIngestorDeps) {
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async fetchAwards(window: IngestionWindow = {}): Promise<IngestionSummary> {
    const fromDate = window.fromDate ?? (await this.resolveWatermark());
    const untilDate = window.untilDate ?? null;
    const { pageSize } = this.deps.config.awardSource;
    const summary: IngestionSummary = { fetched: 0, created: 0, skipped: 0, failed: 0 };

    this.log('[Ingestion] Fetching awards', { fromDate: fromDate.toISOString(), untilDate: untilDate?.toISOString() ?? null });

    let offset = 0;
    for (;;) {
      // A failing page aborts the sweep: there is no way to know what it held
      const page = await this.retrying(() =>
        this.deps.source.fetchAwardsPage({ offset, limit: pageSize, fromDate, untilDate })
      );
      if (page.length === 0) {
        break;
      }
      page.forEach(assertAwardRecordShape);

      for (const record of page) {
        summary.fetched += 1;
        const outcome = await this.processRecord(record);
        summary[outcome] += 1;
      }
      offset += page.length;
    }

    this.log('[Ingestion] Sweep finished', summary);
    return summary;
  }

  /**
   * Manual invitation for one award. Skips propagate to the caller.
   */
  async fetchAwardByIdAndSupplier(awardId: string, supplierId: string): Promise<Application> {
    const records = await this.retrying(() => this.deps.source.fetchAwardByIdAndSupplier(awardId, supplierId));
    if (records.length === 0) {
      throw new SkippedAwardError('Award not found in source', { awardId, supplierId });
    }
    assertAwardRecordShape(records[0]);
    return this.createCompleteApplication(records[0]);
  }

  /**
   * Stores the borrower's unseen contract history as previous awards. Never
   * creates applications.
   */
  async fetchPreviousAwards(borrower: Borrower): Promise<number> {
    const records = await this.retrying(() => this.deps.source.fetchPreviousContracts(borrower.legalIdentifier));
    let stored = 0;

    for (const record of records) {
      const award = mapPreviousContractRecord(record, { borrowerId: borrower.id, now: this.deps.clock() });
      if (!award) {
        continue;
      }
      try {
        const inserted = await this.deps.store.transaction(async tx => {
          if (await tx.findAwardBySourceContractId(award.sourceContractId)) {
            return false;
          }
          await tx.insertAward(award);
          return true;
        });
        if (inserted) {
          stored += 1;
        }
      } catch (error) {
        if (!(error instanceof UniqueViolationError)) {
          throw error;
        }
      }
    }

    this.log('[Ingestion] Previous awards stored', { borrowerId: borrower.id, fetched: records.length, stored });
    return stored;
  }

  private async processRecord(record: RawRecord): Promise<RecordOutcome> {
    try {
      await this.createCompleteApplication(record);
      return 'created';
    } catch (error) {
      if (error instanceof SourceFormatError) {
        throw error;
      }
      if (
        error instanceof SkippedAwardError ||
        error instanceof UniqueViolationError ||
        error instanceof UpstreamHttpError
      ) {
        this.log('[Ingestion] Skipped award', { code: error.code, reason: error.message, details: error.details });
        return 'skipped';
      }
      console.error('[Ingestion] Failed to process award', {
        sourceContractId: record.id_del_portafolio,
        error: describeError(error),
      });
      return 'failed';
    }
  }

  private async createCompleteApplication(record: RawRecord): Promise<Application> {
    const { identity, clock } = this.deps;
    const supplierId = getSupplierId(record);
    const sourceContractId = getSourceContractId(record);
    const borrowerIdentifier = identity.borrowerIdentifier(supplierId);

    // Opted-out borrowers cost no upstream calls
    await this.deps.store.transaction(async tx => {
      const known = await tx.findBorrowerByIdentifier(borrowerIdentifier);
      if (known?.status === 'DECLINED_ALL_OPPORTUNITIES') {
        throw new BorrowerOptedOutError({ borrowerIdentifier });
      }
      if (await tx.findAwardBySourceContractId(sourceContractId)) {
        throw new DuplicateAwardError({ sourceContractId });
      }
    });

    const email = selectBorrowerEmail(
      await this.retrying(() => this.deps.source.fetchBorrowerEmails(supplierId)),
      supplierId
    );
    const borrowerRecord = selectBorrowerRecord(
      await this.retrying(() => this.deps.source.fetchBorrower(supplierId)),
      supplierId
    );

    return this.deps.store.transaction(async tx => {
      const now = clock();
      const borrower = await this.upsertBorrower(
        tx,
        mapBorrowerRecord(borrowerRecord, { borrowerIdentifier, supplierId, email, now })
      );
      const award = await this.insertAward(tx, record, borrower);
      const application = await this.deps.factory.createApplication(tx, { award, borrower });

      await this.deps.dispatcher.dispatch(tx, {
        application,
        messageType: 'BORROWER_INVITATION',
        recipient: 'BORROWER',
        award,
        borrower,
        lender: null,
      });

      this.log('[Ingestion] Application created', { applicationId: application.id, sourceContractId });
      return application;
    });
  }

  private async upsertBorrower(tx: StoreTransaction, observed: NewBorrower): Promise<Borrower> {
    const existing = await tx.findBorrowerByIdentifier(observed.borrowerIdentifier);
    if (!existing) {
      return tx.insertBorrower(observed);
    }
    if (existing.status === 'DECLINED_ALL_OPPORTUNITIES') {
      throw new BorrowerOptedOutError({ borrowerIdentifier: existing.borrowerIdentifier });
    }
    return tx.updateBorrower(existing.id, mergeBorrowerFields(existing, observed, observed.updatedAt));
  }

  private async insertAward(tx: StoreTransaction, record: RawRecord, borrower: Borrower): Promise<Award> {
    const award = mapAwardRecord(record, { borrowerId: borrower.id, previous: false, now: this.deps.clock() });
    if (await tx.findAwardBySourceContractId(award.sourceContractId)) {
      throw new DuplicateAwardError({ sourceContractId: award.sourceContractId });
    }
    try {
      return await tx.insertAward(award);
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new DuplicateAwardError({ sourceContractId: award.sourceContractId });
      }
      throw error;
    }
  }

  private async resolveWatermark(): Promise<Date> {
    const latest = await this.deps.store.transaction(tx => tx.latestAwardUpdate());
    if (latest) {
      return addUtcDays(latest, -WATERMARK_OVERLAP_DAYS);
    }
    return addUtcDays(this.deps.clock(), -this.deps.config.awardSource.defaultDaysBack);
  }

  private retrying<T>(request: () => Promise<T>): Promise<T> {
    return withRetry(request, this.deps.config.awardSource.http, this.sleep);
  }

  private log(message: string, details: object): void {
    if (!this.deps.config.quiet) {
      console.log(message, details);
    }
  }
}
