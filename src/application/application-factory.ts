import { EngineConfig } from '../config';
import { addUtcDays, Clock } from '../domain-types';
import { IdentityService } from '../domain/identity/identity-logic';
import { Application, ApplicationStatus, Award, Borrower, NewApplication } from '../domain/application/application-types';
import {
  ApplicationAlreadyCopiedError,
  ApplicationExistsError,
  BorrowerOptedOutError,
  UniqueViolationError,
} from '../errors';
import { StoreTransaction } from '../store/lifecycle-store';

function blankApplication(params: {
  award: Award;
  borrower: Borrower;
  dedupKey: string;
  uuid: string;
  status: ApplicationStatus;
  now: Date;
  expiredAt: Date;
}): NewApplication {
  return {
    uuid: params.uuid,
    awardBorrowerIdentifier: params.dedupKey,
    status: params.status,
    awardId: params.award.id,
    borrowerId: params.borrower.id,
    lenderId: null,
    creditProductId: null,
    amountRequested: null,
    primaryEmail: params.borrower.email,
    expiredAt: params.expiredAt,
    acceptedAt: params.status === 'ACCEPTED' ? params.now : null,
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
    createdAt: params.now,
    updatedAt: params.now,
  };
}

/**
 * Creates applications at most once per (award, borrower) pair. The dedup key
 * lookup is an early exit; the unique constraint is the real guarantee under
 * concurrent ingestion.
 */
export class ApplicationFactory {
  constructor(
    private identity: IdentityService,
    private config: Pick<EngineConfig, 'lifecycle'>,
    private clock: Clock
  ) {}

  async createApplication(tx: StoreTransaction, params: { award: Award; borrower: Borrower }): Promise<Application> {
    const { award, borrower } = params;
    if (borrower.status === 'DECLINED_ALL_OPPORTUNITIES') {
      throw new BorrowerOptedOutError({ borrowerIdentifier: borrower.borrowerIdentifier });
    }

    const dedupKey = this.identity.awardBorrowerIdentifier(borrower.legalIdentifier, award.sourceContractId);
    const existing = await tx.findApplicationByDedupKey(dedupKey);
    if (existing) {
      throw new ApplicationExistsError({ found: existing.id, sourceContractId: award.sourceContractId });
    }

    const now = this.clock();
    try {
      return await tx.insertApplication(
        blankApplication({
          award,
          borrower,
          dedupKey,
          uuid: this.identity.opaqueToken(dedupKey),
          status: 'PENDING',
          now,
          expiredAt: addUtcDays(now, this.config.lifecycle.applicationExpirationDays),
        })
      );
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new ApplicationExistsError({ sourceContractId: award.sourceContractId, constraint: error.constraint });
      }
      throw error;
    }
  }

  /**
   * Fresh application for the same award and borrower, already ACCEPTED and
   * with no lender, so the borrower can pick a different credit option.
   */
  async copyApplication(
    tx: StoreTransaction,
    params: { source: Application; award: Award; borrower: Borrower }
  ): Promise<Application> {
    const { source, award, borrower } = params;
    const dedupKey = this.identity.alternativeAwardBorrowerIdentifier(borrower.legalIdentifier, award.sourceContractId);
    if (await tx.findApplicationByDedupKey(dedupKey)) {
      throw new ApplicationAlreadyCopiedError({ applicationId: source.id });
    }

    const now = this.clock();
    try {
      return await tx.insertApplication({
        ...blankApplication({
          award,
          borrower,
          dedupKey,
          uuid: this.identity.opaqueToken(dedupKey),
          status: 'ACCEPTED',
          now,
          expiredAt: addUtcDays(now, this.config.lifecycle.applicationExpirationDays),
        }),
        primaryEmail: source.primaryEmail,
      });
    } catch (error) {
      if (error instanceof UniqueViolationError) {
        throw new ApplicationAlreadyCopiedError({ applicationId: source.id, constraint: error.constraint });
      }
      throw error;
    }
  }
}
