/**
 * In-process stand-in for PgLifecycleStore.
 *
 * Transactions run one at a time against a cloned snapshot of the state and
 * are rolled back by restoring the snapshot. The same unique constraints as
 * db/schema.sql raise UniqueViolationError.
 */

import * as crypto from 'crypto';
import { ApplicationId, AwardId, BorrowerId, CreditProductId, Ids, JsonObject, LenderId } from '../../src/domain-types';
import {
  Application,
  ApplicationAction,
  ApplicationActionType,
  ApplicationPatch,
  ApplicationStatus,
  Award,
  Borrower,
  BorrowerDocument,
  BorrowerPatch,
  BorrowerStatus,
  CreditProduct,
  Lender,
  Message,
  MessageType,
  NewApplication,
  NewApplicationAction,
  NewAward,
  NewBorrower,
  NewMessage,
  StatisticType,
} from '../../src/domain/application/application-types';
import { UniqueViolationError } from '../../src/errors';
import {
  ApiKeyRecord,
  ApplicationWindow,
  CredentialStore,
  LifecycleStore,
  StoreTransaction,
} from '../../src/store/lifecycle-store';

export interface StoredStatistic {
  type: StatisticType;
  lenderId: LenderId | null;
  data: JsonObject;
  day: string;
}

interface State {
  awards: Award[];
  borrowers: Borrower[];
  lenders: Lender[];
  creditProducts: CreditProduct[];
  applications: Application[];
  documents: BorrowerDocument[];
  messages: Message[];
  actions: ApplicationAction[];
  statistics: StoredStatistic[];
  apiKeys: (ApiKeyRecord & { keyHash: string })[];
}

function emptyState(): State {
  return {
    awards: [],
    borrowers: [],
    lenders: [],
    creditProducts: [],
    applications: [],
    documents: [],
    messages: [],
    actions: [],
    statistics: [],
    apiKeys: [],
  };
}

const newId = (): string => crypto.randomUUID();

function before(value: Date | null, limit: Date): boolean {
  return value !== null && value.getTime() < limit.getTime();
}

function byTime<T extends { createdAt: Date }>(a: T, b: T): number {
  return a.createdAt.getTime() - b.createdAt.getTime();
}

export type ConcurrentInsertTarget = 'award' | 'application';

class InMemoryTransaction implements StoreTransaction {
  constructor(
    private state: State,
    private concurrentInserts: Set<ConcurrentInsertTarget>
  ) {}

  // === Awards ===

  async findAwardBySourceContractId(sourceContractId: string): Promise<Award | null> {
    return this.state.awards.find(award => award.sourceContractId === sourceContractId) ?? null;
  }

  async getAward(id: AwardId): Promise<Award | null> {
    return this.state.awards.find(award => award.id === id) ?? null;
  }

  async insertAward(award: NewAward): Promise<Award> {
    if (this.concurrentInserts.delete('award')) {
      throw new UniqueViolationError('awards_source_contract_id_key');
    }
    if (this.state.awards.some(existing => existing.sourceContractId === award.sourceContractId)) {
      throw new UniqueViolationError('awards_source_contract_id_key');
    }
    const inserted: Award = { ...award, id: Ids.award(newId()) };
    this.state.awards.push(inserted);
    return { ...inserted };
  }

  async updateAward(id: AwardId, patch: Partial<Pick<Award, 'previous' | 'borrowerId'>>): Promise<void> {
    const index = this.state.awards.findIndex(award => award.id === id);
    if (index >= 0) {
      this.state.awards[index] = { ...this.state.awards[index], ...patch };
    }
  }

  async latestAwardUpdate(): Promise<Date | null> {
    let latest: Date | null = null;
    for (const award of this.state.awards) {
      if (award.sourceLastUpdatedAt && (!latest || award.sourceLastUpdatedAt > latest)) {
        latest = award.sourceLastUpdatedAt;
      }
    }
    return latest;
  }

  // === Borrowers ===

  async findBorrowerByIdentifier(borrowerIdentifier: string): Promise<Borrower | null> {
    const found = this.state.borrowers.find(borrower => borrower.borrowerIdentifier === borrowerIdentifier);
    return found ? { ...found } : null;
  }

  async getBorrower(id: BorrowerId): Promise<Borrower | null> {
    const found = this.state.borrowers.find(borrower => borrower.id === id);
    return found ? { ...found } : null;
  }

  async insertBorrower(borrower: NewBorrower): Promise<Borrower> {
    if (this.state.borrowers.some(existing => existing.borrowerIdentifier === borrower.borrowerIdentifier)) {
      throw new UniqueViolationError('borrowers_borrower_identifier_key');
    }
    const inserted: Borrower = { ...borrower, id: Ids.borrower(newId()), status: 'ACTIVE', declinedAt: null };
    this.state.borrowers.push(inserted);
    return { ...inserted };
  }

  async updateBorrower(id: BorrowerId, patch: BorrowerPatch): Promise<Borrower> {
    const index = this.state.borrowers.findIndex(borrower => borrower.id === id);
    if (index < 0) {
      throw new Error('BORROWER_NOT_FOUND');
    }
    this.state.borrowers[index] = { ...this.state.borrowers[index], ...patch };
    return { ...this.state.borrowers[index] };
  }

  // === Lenders ===

  async getLender(id: LenderId): Promise<Lender | null> {
    return this.state.lenders.find(lender => lender.id === id) ?? null;
  }

  async listLenders(): Promise<Lender[]> {
    return [...this.state.lenders].sort((a, b) => a.name.localeCompare(b.name));
  }

  async getCreditProduct(id: CreditProductId): Promise<CreditProduct | null> {
    return this.state.creditProducts.find(product => product.id === id) ?? null;
  }

  // === Applications ===

  async getApplication(id: ApplicationId): Promise<Application | null> {
    const found = this.state.applications.find(application => application.id === id);
    return found ? { ...found } : null;
  }

  async findApplicationByUuid(uuid: string): Promise<Application | null> {
    const found = this.state.applications.find(application => application.uuid === uuid);
    return found ? { ...found } : null;
  }

  async findApplicationByDedupKey(awardBorrowerIdentifier: string): Promise<Application | null> {
    const found = this.state.applications.find(
      application => application.awardBorrowerIdentifier === awardBorrowerIdentifier
    );
    return found ? { ...found } : null;
  }

  async insertApplication(application: NewApplication): Promise<Application> {
    if (this.concurrentInserts.delete('application')) {
      throw new UniqueViolationError('applications_award_borrower_identifier_key');
    }
    if (this.state.applications.some(existing => existing.awardBorrowerIdentifier === application.awardBorrowerIdentifier)) {
      throw new UniqueViolationError('applications_award_borrower_identifier_key');
    }
    if (this.state.applications.some(existing => existing.uuid === application.uuid)) {
      throw new UniqueViolationError('applications_uuid_key');
    }
    const inserted: Application = { ...application, id: Ids.application(newId()) };
    this.state.applications.push(inserted);
    return { ...inserted };
  }

  async updateApplication(id: ApplicationId, patch: ApplicationPatch): Promise<Application> {
    const index = this.state.applications.findIndex(application => application.id === id);
    if (index < 0) {
      throw new Error('APPLICATION_NOT_FOUND');
    }
    this.state.applications[index] = { ...this.state.applications[index], ...patch };
    return { ...this.state.applications[index] };
  }

  async hasOtherUnarchivedApplications(borrowerId: BorrowerId, excludeId: ApplicationId): Promise<boolean> {
    return this.state.applications.some(
      application => application.borrowerId === borrowerId && application.id !== excludeId && !application.archivedAt
    );
  }

  // === Sweep candidates ===

  private hasMessageOfType(applicationId: ApplicationId, type: MessageType): boolean {
    return this.state.messages.some(message => message.applicationId === applicationId && message.type === type);
  }

  private expiringWithin(application: Application, window: ApplicationWindow & { expiresBefore: Date }): boolean {
    const expiry = application.expiredAt.getTime();
    return expiry > window.now.getTime() && expiry <= window.expiresBefore.getTime();
  }

  async findIntroductionReminderCandidates(window: ApplicationWindow & { expiresBefore: Date }): Promise<Application[]> {
    return this.state.applications
      .filter(application => {
        const borrower = this.state.borrowers.find(candidate => candidate.id === application.borrowerId);
        return (
          application.status === 'PENDING' &&
          this.expiringWithin(application, window) &&
          borrower?.status === 'ACTIVE' &&
          !this.hasMessageOfType(application.id, 'BORROWER_PENDING_APPLICATION_REMINDER')
        );
      })
      .map(application => ({ ...application }));
  }

  async findSubmissionReminderCandidates(window: ApplicationWindow & { expiresBefore: Date }): Promise<Application[]> {
    return this.state.applications
      .filter(
        application =>
          application.status === 'ACCEPTED' &&
          this.expiringWithin(application, window) &&
          !this.hasMessageOfType(application.id, 'BORROWER_PENDING_SUBMIT_REMINDER')
      )
      .map(application => ({ ...application }));
  }

  async findLapseCandidates(window: ApplicationWindow & { enteredBefore: Date }): Promise<Application[]> {
    const limit = window.enteredBefore;
    return this.state.applications
      .filter(
        application =>
          (application.status === 'PENDING' && before(application.createdAt, limit)) ||
          (application.status === 'ACCEPTED' && before(application.acceptedAt, limit)) ||
          (application.status === 'INFORMATION_REQUESTED' && before(application.informationRequestedAt, limit))
      )
      .sort(byTime)
      .map(application => ({ ...application }));
  }

  async findArchivableCandidates(window: ApplicationWindow & { terminatedBefore: Date }): Promise<Application[]> {
    const limit = window.terminatedBefore;
    return this.state.applications
      .filter(
        application =>
          !application.archivedAt &&
          ((application.status === 'DECLINED' && before(application.declinedAt, limit)) ||
            (application.status === 'REJECTED' && before(application.rejectedAt, limit)) ||
            (application.status === 'COMPLETED' && before(application.completedAt, limit)) ||
            (application.status === 'LAPSED' && before(application.lapsedAt, limit)))
      )
      .sort(byTime)
      .map(application => ({ ...application }));
  }

  async findApplicationsWithStatus(statuses: readonly ApplicationStatus[]): Promise<Application[]> {
    return this.state.applications
      .filter(application => statuses.includes(application.status))
      .sort(byTime)
      .map(application => ({ ...application }));
  }

  // === Audit ===

  async insertMessage(message: NewMessage): Promise<Message> {
    const inserted: Message = { ...message, id: Ids.message(newId()) };
    this.state.messages.push(inserted);
    return { ...inserted };
  }

  async hasMessage(applicationId: ApplicationId, type: MessageType): Promise<boolean> {
    return this.hasMessageOfType(applicationId, type);
  }

  async listMessages(applicationId: ApplicationId): Promise<Message[]> {
    return this.state.messages.filter(message => message.applicationId === applicationId).sort(byTime);
  }

  async insertAction(action: NewApplicationAction): Promise<ApplicationAction> {
    const inserted: ApplicationAction = { ...action, id: Ids.action(newId()) };
    this.state.actions.push(inserted);
    return { ...inserted };
  }

  async listActions(applicationId: ApplicationId, types?: readonly ApplicationActionType[]): Promise<ApplicationAction[]> {
    return this.state.actions
      .filter(action => action.applicationId === applicationId && (!types || types.includes(action.type)))
      .sort(byTime);
  }

  // === Documents ===

  async deleteDocuments(applicationId: ApplicationId): Promise<number> {
    const count = this.state.documents.length;
    this.state.documents = this.state.documents.filter(document => document.applicationId !== applicationId);
    return count - this.state.documents.length;
  }

  // === Statistics ===

  async countApplicationsByStatus(lenderId?: LenderId): Promise<Partial<Record<ApplicationStatus, number>>> {
    const counts: Partial<Record<ApplicationStatus, number>> = {};
    for (const application of this.state.applications) {
      if (lenderId && application.lenderId !== lenderId) {
        continue;
      }
      counts[application.status] = (counts[application.status] ?? 0) + 1;
    }
    return counts;
  }

  async countBorrowersByStatus(): Promise<Partial<Record<BorrowerStatus, number>>> {
    const counts: Partial<Record<BorrowerStatus, number>> = {};
    for (const borrower of this.state.borrowers) {
      counts[borrower.status] = (counts[borrower.status] ?? 0) + 1;
    }
    return counts;
  }

  async upsertStatistic(statistic: { type: StatisticType; lenderId: LenderId | null; data: JsonObject; day: Date }): Promise<void> {
    const day = statistic.day.toISOString().slice(0, 10);
    const row: StoredStatistic = { type: statistic.type, lenderId: statistic.lenderId, data: statistic.data, day };
    const index = this.state.statistics.findIndex(
      existing => existing.day === day && existing.type === statistic.type && existing.lenderId === statistic.lenderId
    );
    if (index >= 0) {
      this.state.statistics[index] = row;
    } else {
      this.state.statistics.push(row);
    }
  }
}

export class InMemoryLifecycleStore implements LifecycleStore, CredentialStore {
  private state: State = emptyState();
  private queue: Promise<unknown> = Promise.resolve();
  private concurrentInserts = new Set<ConcurrentInsertTarget>();

  /**
   * The next insert of `target` fails its unique constraint as if another
   * writer committed the same key after this transaction's lookup.
   */
  simulateConcurrentInsert(target: ConcurrentInsertTarget): void {
    this.concurrentInserts.add(target);
  }

  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      const snapshot = structuredClone(this.state);
      try {
        return await work(new InMemoryTransaction(this.state, this.concurrentInserts));
      } catch (error) {
        this.state = snapshot;
        throw error;
      }
    });
    this.queue = run.catch(() => undefined);
    return run;
  }

  /**
   * Resolves once every queued transaction, including fire-and-forget ones,
   * has finished.
   */
  async settle(): Promise<void> {
    let current: Promise<unknown> | null = null;
    while (current !== this.queue) {
      current = this.queue;
      await current;
    }
  }

  async findApiKeyByHash(keyHash: string): Promise<ApiKeyRecord | null> {
    const found = this.state.apiKeys.find(record => record.keyHash === keyHash);
    if (!found) {
      return null;
    }
    const { keyHash: _hash, ...record } = found;
    return record;
  }

  // === Seeding ===

  seedLender(overrides: Partial<Lender> = {}): Lender {
    const lender: Lender = {
      id: Ids.lender(newId()),
      name: 'Test Lender',
      emailGroup: 'lender@example.org',
      slaDays: 10,
      ...overrides,
    };
    this.state.lenders.push(lender);
    return lender;
  }

  seedCreditProduct(lenderId: LenderId, overrides: Partial<CreditProduct> = {}): CreditProduct {
    const product: CreditProduct = {
      id: Ids.creditProduct(newId()),
      lenderId,
      borrowerSize: 'SMALL',
      lowerLimit: 1_000,
      upperLimit: 100_000,
      ...overrides,
    };
    this.state.creditProducts.push(product);
    return product;
  }

  seedApiKey(keyHash: string, record: ApiKeyRecord): void {
    this.state.apiKeys.push({ ...record, keyHash });
  }

  seedBorrower(overrides: Partial<Borrower> = {}): Borrower {
    const now = overrides.createdAt ?? new Date('2024-01-01T00:00:00.000Z');
    const borrower: Borrower = {
      id: Ids.borrower(newId()),
      borrowerIdentifier: `borrower-${newId()}`,
      legalName: 'Test Borrower SAS',
      legalIdentifier: '900123456',
      email: 'borrower@example.org',
      address: 'Direccion: Calle 1',
      type: 'Empresa',
      size: 'SMALL',
      sector: 'Servicios',
      status: 'ACTIVE',
      declinedAt: null,
      sourceData: {},
      createdAt: now,
      updatedAt: now,
      ...overrides,
    };
    this.state.borrowers.push(borrower);
    return { ...borrower };
  }

  seedAward(overrides: Partial<Award> = {}): Award {
    const award: Award = {
      id: Ids.award(newId()),
      sourceContractId: `CO1.PPI.${newId().slice(0, 8)}`,
      borrowerId: null,
      buyerName: 'Alcaldia de Prueba',
      title: 'Suministro de equipos',
      description: 'Compra de equipos de oficina',
      amount: 50_000_000,
      currency: 'COP',
      procurementCategory: 'Suministros',
      procurementMethod: 'Licitacion publica',
      contractStartDate: null,
      contractEndDate: null,
      awardDate: null,
      sourceUrl: '',
      sourceLastUpdatedAt: null,
      sourceData: {},
      previous: false,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
      ...overrides,
    };
    this.state.awards.push(award);
    return { ...award };
  }

  seedApplication(award: Award, borrower: Borrower, overrides: Partial<Application> = {}): Application {
    const createdAt = overrides.createdAt ?? new Date('2024-01-01T00:00:00.000Z');
    const application: Application = {
      id: Ids.application(newId()),
      uuid: newId(),
      awardBorrowerIdentifier: `dedup-${newId()}`,
      status: 'PENDING',
      awardId: award.id,
      borrowerId: borrower.id,
      lenderId: null,
      creditProductId: null,
      amountRequested: null,
      primaryEmail: borrower.email,
      expiredAt: new Date(createdAt.getTime() + 7 * 24 * 60 * 60 * 1000),
      acceptedAt: null,
      declinedAt: null,
      submittedAt: null,
      lenderStartedAt: null,
      informationRequestedAt: null,
      approvedAt: null,
      rejectedAt: null,
      contractUploadedAt: null,
      completedAt: null,
      lapsedAt: null,
      archivedAt: null,
      overduedAt: null,
      completedInDays: null,
      pendingDocuments: false,
      declinedData: {},
      declinedPreferencesData: {},
      approvedData: {},
      rejectedData: {},
      disbursedFinalAmount: null,
      contractAmountSubmitted: null,
      createdAt,
      updatedAt: createdAt,
      ...overrides,
    };
    this.state.applications.push(application);
    return { ...application };
  }

  seedAction(applicationId: ApplicationId, type: ApplicationActionType, createdAt: Date, data: JsonObject = {}): void {
    this.state.actions.push({ id: Ids.action(newId()), applicationId, type, userId: null, data, createdAt });
  }

  seedMessage(applicationId: ApplicationId, type: MessageType, createdAt: Date): void {
    this.state.messages.push({
      id: Ids.message(newId()),
      applicationId,
      type,
      externalMessageId: 'seeded',
      body: '',
      lenderId: null,
      createdAt,
    });
  }

  seedDocument(applicationId: ApplicationId, name: string = 'financial-statement.pdf'): void {
    this.state.documents.push({
      id: Ids.document(newId()),
      applicationId,
      type: 'FINANCIAL_STATEMENT',
      name,
      createdAt: new Date('2024-01-01T00:00:00.000Z'),
    });
  }

  // === Inspection ===

  application(id: ApplicationId): Application | undefined {
    return this.state.applications.find(application => application.id === id);
  }

  applications(): Application[] {
    return [...this.state.applications];
  }

  award(id: AwardId): Award | undefined {
    return this.state.awards.find(award => award.id === id);
  }

  awards(): Award[] {
    return [...this.state.awards];
  }

  borrower(id: BorrowerId): Borrower | undefined {
    return this.state.borrowers.find(borrower => borrower.id === id);
  }

  borrowers(): Borrower[] {
    return [...this.state.borrowers];
  }

  messages(applicationId?: ApplicationId): Message[] {
    return this.state.messages.filter(message => !applicationId || message.applicationId === applicationId);
  }

  actions(applicationId?: ApplicationId): ApplicationAction[] {
    return this.state.actions.filter(action => !applicationId || action.applicationId === applicationId);
  }

  documents(applicationId: ApplicationId): BorrowerDocument[] {
    return this.state.documents.filter(document => document.applicationId === applicationId);
  }

  statistics(): StoredStatistic[] {
    return [...this.state.statistics];
  }
}
