import { ApplicationId, AwardId, BorrowerId, CreditProductId, JsonObject, LenderId } from '../domain-types';
import {
  Application,
  ApplicationAction,
  ApplicationActionType,
  ApplicationPatch,
  ApplicationStatus,
  Award,
  Borrower,
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
} from '../domain/application/application-types';

/**
 * Persistence contract for the lifecycle engine.
 *
 * Every mutation happens inside `transaction`. Implementations must enforce
 * uniqueness of Award.sourceContractId, Borrower.borrowerIdentifier,
 * Application.awardBorrowerIdentifier and Application.uuid, raising
 * UniqueViolationError with the constraint name on conflict.
 */
export interface LifecycleStore {
  transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T>;
}

export interface ApplicationWindow {
  now: Date;
}

export interface StoreTransaction {
  // === Awards ===
  findAwardBySourceContractId(sourceContractId: string): Promise<Award | null>;
  getAward(id: AwardId): Promise<Award | null>;
  insertAward(award: NewAward): Promise<Award>;
  updateAward(id: AwardId, patch: Partial<Pick<Award, 'previous' | 'borrowerId'>>): Promise<void>;
  latestAwardUpdate(): Promise<Date | null>;

  // === Borrowers ===
  findBorrowerByIdentifier(borrowerIdentifier: string): Promise<Borrower | null>;
  getBorrower(id: BorrowerId): Promise<Borrower | null>;
  insertBorrower(borrower: NewBorrower): Promise<Borrower>;
  updateBorrower(id: BorrowerId, patch: BorrowerPatch): Promise<Borrower>;

  // === Lenders (read-only) ===
  getLender(id: LenderId): Promise<Lender | null>;
  listLenders(): Promise<Lender[]>;
  getCreditProduct(id: CreditProductId): Promise<CreditProduct | null>;

  // === Applications ===
  getApplication(id: ApplicationId, options?: { forUpdate?: boolean }): Promise<Application | null>;
  findApplicationByUuid(uuid: string, options?: { forUpdate?: boolean }): Promise<Application | null>;
  findApplicationByDedupKey(awardBorrowerIdentifier: string): Promise<Application | null>;
  insertApplication(application: NewApplication): Promise<Application>;
  updateApplication(id: ApplicationId, patch: ApplicationPatch): Promise<Application>;
  hasOtherUnarchivedApplications(borrowerId: BorrowerId, excludeId: ApplicationId): Promise<boolean>;

  // === Sweep candidates (range queries by timestamp) ===
  findIntroductionReminderCandidates(window: ApplicationWindow & { expiresBefore: Date }): Promise<Application[]>;
  findSubmissionReminderCandidates(window: ApplicationWindow & { expiresBefore: Date }): Promise<Application[]>;
  findLapseCandidates(window: ApplicationWindow & { enteredBefore: Date }): Promise<Application[]>;
  findArchivableCandidates(window: ApplicationWindow & { terminatedBefore: Date }): Promise<Application[]>;
  findApplicationsWithStatus(statuses: readonly ApplicationStatus[]): Promise<Application[]>;

  // === Audit ===
  insertMessage(message: NewMessage): Promise<Message>;
  hasMessage(applicationId: ApplicationId, type: MessageType): Promise<boolean>;
  listMessages(applicationId: ApplicationId): Promise<Message[]>;
  insertAction(action: NewApplicationAction): Promise<ApplicationAction>;
  listActions(applicationId: ApplicationId, types?: readonly ApplicationActionType[]): Promise<ApplicationAction[]>;

  // === Documents ===
  deleteDocuments(applicationId: ApplicationId): Promise<number>;

  // === Statistics ===
  countApplicationsByStatus(lenderId?: LenderId): Promise<Partial<Record<ApplicationStatus, number>>>;
  countBorrowersByStatus(): Promise<Partial<Record<BorrowerStatus, number>>>;
  upsertStatistic(statistic: { type: StatisticType; lenderId: LenderId | null; data: JsonObject; day: Date }): Promise<void>;
}

// === API credentials ===

export type ApiClientType = 'LENDER' | 'ADMIN';

export interface ApiKeyRecord {
  apiKeyId: string;
  clientType: ApiClientType;
  userId: string;
  lenderId: LenderId | null;
  expiresAt: Date | null;
  revokedAt: Date | null;
}

export interface CredentialStore {
  findApiKeyByHash(keyHash: string): Promise<ApiKeyRecord | null>;
}
