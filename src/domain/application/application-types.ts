import {
  ActionId,
  ApplicationId,
  AwardId,
  BorrowerId,
  CreditProductId,
  DocumentId,
  JsonObject,
  LenderId,
  MessageId,
} from '../../domain-types';
import type { LifecycleError } from '../../errors';

// ============================================
// STATUSES
// ============================================

export const APPLICATION_STATUSES = [
  'PENDING',
  'ACCEPTED',
  'DECLINED',
  'SUBMITTED',
  'STARTED',
  'INFORMATION_REQUESTED',
  'APPROVED',
  'CONTRACT_UPLOADED',
  'COMPLETED',
  'REJECTED',
  'LAPSED',
] as const;

export type ApplicationStatus = typeof APPLICATION_STATUSES[number];

export const BORROWER_STATUSES = ['ACTIVE', 'DECLINED_ALL_OPPORTUNITIES'] as const;

export type BorrowerStatus = typeof BORROWER_STATUSES[number];

export type BorrowerSize = 'NOT_INFORMED' | 'MICRO' | 'SMALL' | 'MEDIUM' | 'BIG';

// ============================================
// MESSAGES & ACTIONS (append-only audit)
// ============================================

export type MessageType =
  | 'BORROWER_INVITATION'
  | 'BORROWER_PENDING_APPLICATION_REMINDER'
  | 'BORROWER_PENDING_SUBMIT_REMINDER'
  | 'SUBMISSION_COMPLETE'
  | 'NEW_APPLICATION_LENDER'
  | 'NEW_APPLICATION_ADMIN'
  | 'LENDER_MESSAGE'
  | 'BORROWER_DOCUMENT_UPDATED'
  | 'APPROVED_APPLICATION'
  | 'CONTRACT_UPLOAD_CONFIRMATION'
  | 'CONTRACT_UPLOAD_CONFIRMATION_TO_LENDER'
  | 'CREDIT_DISBURSED'
  | 'REJECTED_APPLICATION'
  | 'APPLICATION_COPIED'
  | 'OVERDUE_APPLICATION_ADMIN'
  | 'OVERDUE_APPLICATION_LENDER';

export type ApplicationActionType =
  | 'BORROWER_ACCEPTED_INVITATION'
  | 'BORROWER_DECLINED_INVITATION'
  | 'BORROWER_ROLLBACK_DECLINE'
  | 'BORROWER_DECLINE_FEEDBACK'
  | 'APPLICATION_CONFIRM_CREDIT_PRODUCT'
  | 'BORROWER_SUBMITTED_APPLICATION'
  | 'LENDER_STARTED_APPLICATION'
  | 'LENDER_REQUEST_INFORMATION'
  | 'BORROWER_UPLOAD_ADDITIONAL_DOCUMENT_COMPLETED'
  | 'APPROVED_APPLICATION'
  | 'BORROWER_UPLOAD_CONTRACT'
  | 'LENDER_COMPLETE_APPLICATION'
  | 'REJECTED_APPLICATION'
  | 'APPLICATION_LAPSED'
  | 'COPIED_APPLICATION'
  | 'APPLICATION_COPIED_FROM'
  | 'APPLICATION_ARCHIVED'
  | 'APPLICATION_OVERDUE';

export type StatisticType = 'APPLICATION_KPIS' | 'BORROWER_OPT_IN_STATISTICS';

// ============================================
// ENTITIES
// ============================================

export interface Award {
  id: AwardId;
  sourceContractId: string;
  borrowerId: BorrowerId | null;
  buyerName: string;
  title: string;
  description: string;
  amount: number;
  currency: string;
  procurementCategory: string;
  procurementMethod: string;
  contractStartDate: Date | null;
  contractEndDate: Date | null;
  awardDate: Date | null;
  sourceUrl: string;
  sourceLastUpdatedAt: Date | null;
  sourceData: JsonObject;
  previous: boolean;
  createdAt: Date;
}

export type NewAward = Omit<Award, 'id'>;

export interface Borrower {
  id: BorrowerId;
  borrowerIdentifier: string;
  legalName: string;
  legalIdentifier: string;
  email: string;
  address: string;
  type: string;
  size: BorrowerSize;
  sector: string;
  status: BorrowerStatus;
  declinedAt: Date | null;
  sourceData: JsonObject;
  createdAt: Date;
  updatedAt: Date;
}

export type NewBorrower = Omit<Borrower, 'id' | 'status' | 'declinedAt'>;

export type BorrowerPatch = Partial<Omit<Borrower, 'id' | 'borrowerIdentifier' | 'createdAt'>>;

export interface Lender {
  id: LenderId;
  name: string;
  emailGroup: string;
  slaDays: number;
}

export interface CreditProduct {
  id: CreditProductId;
  lenderId: LenderId;
  borrowerSize: BorrowerSize;
  lowerLimit: number;
  upperLimit: number;
}

export interface ApplicationTimestamps {
  acceptedAt: Date | null;
  declinedAt: Date | null;
  submittedAt: Date | null;
  lenderStartedAt: Date | null;
  informationRequestedAt: Date | null;
  approvedAt: Date | null;
  rejectedAt: Date | null;
  contractUploadedAt: Date | null;
  completedAt: Date | null;
  lapsedAt: Date | null;
  archivedAt: Date | null;
  overduedAt: Date | null;
}

export interface Application extends ApplicationTimestamps {
  id: ApplicationId;
  uuid: string;
  awardBorrowerIdentifier: string;
  status: ApplicationStatus;
  awardId: AwardId;
  borrowerId: BorrowerId;
  lenderId: LenderId | null;
  creditProductId: CreditProductId | null;
  amountRequested: number | null;
  primaryEmail: string;
  expiredAt: Date;
  completedInDays: number | null;
  pendingDocuments: boolean;
  declinedData: JsonObject;
  declinedPreferencesData: JsonObject;
  approvedData: JsonObject;
  rejectedData: JsonObject;
  disbursedFinalAmount: number | null;
  contractAmountSubmitted: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewApplication = Omit<Application, 'id'>;

export type ApplicationPatch = Partial<Omit<Application, 'id' | 'uuid' | 'awardBorrowerIdentifier' | 'createdAt'>>;

export interface BorrowerDocument {
  id: DocumentId;
  applicationId: ApplicationId;
  type: string;
  name: string;
  createdAt: Date;
}

export interface Message {
  id: MessageId;
  applicationId: ApplicationId;
  type: MessageType;
  externalMessageId: string;
  body: string;
  lenderId: LenderId | null;
  createdAt: Date;
}

export type NewMessage = Omit<Message, 'id'>;

export interface ApplicationAction {
  id: ActionId;
  applicationId: ApplicationId;
  type: ApplicationActionType;
  userId: string | null;
  data: JsonObject;
  createdAt: Date;
}

export type NewApplicationAction = Omit<ApplicationAction, 'id'>;

export interface Statistic {
  type: StatisticType;
  lenderId: LenderId | null;
  data: JsonObject;
  createdAt: Date;
}

// ============================================
// ACTORS
// ============================================

export type Actor =
  | { kind: 'BORROWER' }
  | { kind: 'LENDER'; userId: string; lenderId: LenderId }
  | { kind: 'ADMIN'; userId: string }
  | { kind: 'SYSTEM' };

export type ActorKind = Actor['kind'];

// ============================================
// LIFECYCLE EVENTS
// ============================================

export type LifecycleEvent =
  | { type: 'ACCEPT' }
  | { type: 'DECLINE'; declineThis: boolean; declineAll: boolean }
  | { type: 'ROLLBACK_DECLINE' }
  | { type: 'DECLINE_FEEDBACK'; feedback: JsonObject }
  | {
      type: 'CONFIRM_CREDIT_PRODUCT';
      lenderId: LenderId;
      creditProductId: CreditProductId;
      amountRequested: number;
    }
  | { type: 'SUBMIT' }
  | { type: 'START' }
  | { type: 'REQUEST_INFORMATION'; message: string }
  | { type: 'COMPLETE_INFORMATION_REQUEST' }
  | { type: 'APPROVE'; approvedData: JsonObject }
  | { type: 'UPLOAD_CONTRACT'; contractAmountSubmitted: number | null }
  | { type: 'COMPLETE'; disbursedFinalAmount: number; completedInDays: number }
  | { type: 'REJECT'; rejectedData: JsonObject }
  | { type: 'LAPSE' };

export type LifecycleEventType = LifecycleEvent['type'];

export type LifecycleOperation = LifecycleEventType | 'FIND_ALTERNATIVE_CREDIT';

// ============================================
// SIDE EFFECTS (returned as data, executed by the caller)
// ============================================

export type Recipient = 'BORROWER' | 'LENDER' | 'ADMIN';

export type SideEffect =
  | { kind: 'RECORD_ACTION'; actionType: ApplicationActionType; data: JsonObject }
  | { kind: 'NOTIFY'; messageType: MessageType; recipient: Recipient; body?: string }
  | { kind: 'SET_BORROWER_STATUS'; status: BorrowerStatus };

export interface TransitionContext {
  now: Date;
  actor: Actor;
}

export type TransitionResult =
  | { ok: true; status: ApplicationStatus; patch: ApplicationPatch; effects: SideEffect[] }
  | { ok: false; error: LifecycleError };

export function isApplicationStatus(value: string): value is ApplicationStatus {
  return APPLICATION_STATUSES.some(status => status === value);
}

export function isBorrowerStatus(value: string): value is BorrowerStatus {
  return BORROWER_STATUSES.some(status => status === value);
}
