import { EngineConfig } from '../config';
import { ApplicationId, Clock, CreditProductId } from '../domain-types';
import {
  Actor,
  Application,
  Borrower,
  LifecycleEvent,
  TransitionResult,
} from '../domain/application/application-types';
import { actorUserId, checkCopyAllowed, planTransition } from '../domain/application/application-logic';
import { daysWaitingForLender } from '../domain/application/timeline-logic';
import { CreditProductNotFoundError, describeError, LifecycleError, NotFoundError } from '../errors';
import { LifecycleStore, StoreTransaction } from '../store/lifecycle-store';
import { ApplicationFactory } from './application-factory';
import { NotificationDispatcher } from './notification-dispatcher';
import { StatisticsRefresher } from './statistics-service';

export type AcceptedHook = (borrower: Borrower) => Promise<unknown>;

export interface LifecycleServiceDeps {
  store: LifecycleStore;
  factory: ApplicationFactory;
  dispatcher: NotificationDispatcher;
  statistics: StatisticsRefresher;
  config: Pick<EngineConfig, 'lifecycle'>;
  clock: Clock;
  onAccepted?: AcceptedHook;
}

const BORROWER_ACTOR: Actor = { kind: 'BORROWER' };

export interface CopyResult {
  source: Application;
  copy: Application;
}

/**
 * Executes lifecycle transitions. Each call locks the application, plans the
 * transition with the pure state machine and applies the patch, actions,
 * borrower changes and notifications in one transaction.
 */
export class LifecycleService {
  constructor(private deps: LifecycleServiceDeps) {}

  async getByUuid(uuid: string): Promise<Application> {
    const application = await this.deps.store.transaction(tx => tx.findApplicationByUuid(uuid));
    if (!application) {
      throw new NotFoundError('Application', { uuid });
    }
    return application;
  }

  async transitionByUuid(uuid: string, event: LifecycleEvent, actor: Actor = BORROWER_ACTOR): Promise<Application> {
    const updated = await this.deps.store.transaction(async tx => {
      const application = await this.lockByUuid(tx, uuid);
      return this.transitionWithin(tx, application, event, actor);
    });
    this.afterCommit(updated, event);
    return updated;
  }

  async transitionById(id: ApplicationId, event: LifecycleEvent, actor: Actor): Promise<Application> {
    const updated = await this.deps.store.transaction(async tx => {
      const application = await this.lockById(tx, id);
      return this.transitionWithin(tx, application, event, actor);
    });
    this.afterCommit(updated, event);
    return updated;
  }

  /**
   * Borrower picks a lender's credit product. The lender is taken from the
   * product, and the requested amount must fall within its limits.
   */
  async confirmCreditProduct(
    uuid: string,
    request: { creditProductId: CreditProductId; amountRequested: number },
    actor: Actor = BORROWER_ACTOR
  ): Promise<Application> {
    const updated = await this.deps.store.transaction(async tx => {
      const application = await this.lockByUuid(tx, uuid);
      const product = await tx.getCreditProduct(request.creditProductId);
      if (!product) {
        throw new CreditProductNotFoundError({ creditProductId: request.creditProductId });
      }
      if (request.amountRequested < product.lowerLimit || request.amountRequested > product.upperLimit) {
        throw new LifecycleError('AMOUNT_OUT_OF_RANGE', 'Requested amount is outside the credit product limits', {
          amountRequested: request.amountRequested,
          lowerLimit: product.lowerLimit,
          upperLimit: product.upperLimit,
        });
      }
      return this.transitionWithin(
        tx,
        application,
        {
          type: 'CONFIRM_CREDIT_PRODUCT',
          lenderId: product.lenderId,
          creditProductId: product.id,
          amountRequested: request.amountRequested,
        },
        actor
      );
    });
    this.afterCommit(updated, { type: 'CONFIRM_CREDIT_PRODUCT' });
    return updated;
  }

  /**
   * Lender marks the credit as disbursed. completedInDays is the time the
   * application spent waiting on the lender.
   */
  async complete(id: ApplicationId, request: { disbursedFinalAmount: number }, actor: Actor): Promise<Application> {
    const updated = await this.deps.store.transaction(async tx => {
      const application = await this.lockById(tx, id);
      const completedInDays = await this.daysWaiting(tx, application, this.deps.clock());
      return this.transitionWithin(
        tx,
        application,
        { type: 'COMPLETE', disbursedFinalAmount: request.disbursedFinalAmount, completedInDays },
        actor
      );
    });
    this.afterCommit(updated, { type: 'COMPLETE' });
    return updated;
  }

  /**
   * Copies a rejected application so the borrower can apply to another
   * lender. Allowed once per source application.
   */
  async findAlternativeCredit(uuid: string, actor: Actor = BORROWER_ACTOR): Promise<CopyResult> {
    const result = await this.deps.store.transaction(async tx => {
      const source = await this.lockByUuid(tx, uuid);
      const guard = checkCopyAllowed(source, await tx.listActions(source.id, ['COPIED_APPLICATION']));
      if (guard) {
        throw guard;
      }

      const [award, borrower] = await Promise.all([tx.getAward(source.awardId), tx.getBorrower(source.borrowerId)]);
      if (!award) {
        throw new NotFoundError('Award', { awardId: source.awardId });
      }
      if (!borrower) {
        throw new NotFoundError('Borrower', { borrowerId: source.borrowerId });
      }

      const copy = await this.deps.factory.copyApplication(tx, { source, award, borrower });
      const now = this.deps.clock();
      const userId = actorUserId(actor);
      await tx.insertAction({
        applicationId: source.id,
        type: 'COPIED_APPLICATION',
        userId,
        data: { copiedApplicationId: copy.id },
        createdAt: now,
      });
      await tx.insertAction({
        applicationId: copy.id,
        type: 'APPLICATION_COPIED_FROM',
        userId,
        data: { sourceApplicationId: source.id },
        createdAt: now,
      });
      await this.deps.dispatcher.dispatch(tx, {
        application: copy,
        messageType: 'APPLICATION_COPIED',
        recipient: 'BORROWER',
        award,
        borrower,
        lender: null,
      });
      return { source, copy };
    });
    this.refreshStatistics();
    return result;
  }

  /**
   * Applies one event to an already-locked application inside the caller's
   * transaction. Sweeps use this to share a transaction with their re-check.
   */
  async transitionWithin(
    tx: StoreTransaction,
    application: Application,
    event: LifecycleEvent,
    actor: Actor
  ): Promise<Application> {
    const now = this.deps.clock();
    const plan: TransitionResult = planTransition(application, event, { now, actor });
    if (!plan.ok) {
      throw plan.error;
    }

    const updated = await tx.updateApplication(application.id, { ...plan.patch, updatedAt: now });
    const userId = actorUserId(actor);

    for (const effect of plan.effects) {
      switch (effect.kind) {
        case 'RECORD_ACTION':
          await tx.insertAction({
            applicationId: updated.id,
            type: effect.actionType,
            userId,
            data: effect.data,
            createdAt: now,
          });
          break;
        case 'SET_BORROWER_STATUS':
          await tx.updateBorrower(updated.borrowerId, {
            status: effect.status,
            declinedAt: effect.status === 'DECLINED_ALL_OPPORTUNITIES' ? now : null,
            updatedAt: now,
          });
          break;
        case 'NOTIFY':
          await this.deps.dispatcher.dispatch(tx, {
            application: updated,
            messageType: effect.messageType,
            recipient: effect.recipient,
            body: effect.body,
          });
          break;
      }
    }

    return updated;
  }

  async daysWaiting(tx: StoreTransaction, application: Application, now: Date): Promise<number> {
    const actions = await tx.listActions(application.id, [
      'LENDER_REQUEST_INFORMATION',
      'BORROWER_UPLOAD_ADDITIONAL_DOCUMENT_COMPLETED',
    ]);
    return daysWaitingForLender(
      application.lenderStartedAt,
      actions.filter(action => action.type === 'LENDER_REQUEST_INFORMATION').map(action => action.createdAt),
      actions
        .filter(action => action.type === 'BORROWER_UPLOAD_ADDITIONAL_DOCUMENT_COMPLETED')
        .map(action => action.createdAt),
      now
    );
  }

  private async lockByUuid(tx: StoreTransaction, uuid: string): Promise<Application> {
    const application = await tx.findApplicationByUuid(uuid, { forUpdate: true });
    if (!application) {
      throw new NotFoundError('Application', { uuid });
    }
    return application;
  }

  private async lockById(tx: StoreTransaction, id: ApplicationId): Promise<Application> {
    const application = await tx.getApplication(id, { forUpdate: true });
    if (!application) {
      throw new NotFoundError('Application', { applicationId: id });
    }
    return application;
  }

  private afterCommit(application: Application, event: Pick<LifecycleEvent, 'type'>): void {
    this.refreshStatistics();
    if (event.type === 'ACCEPT' && this.deps.onAccepted) {
      const hook = this.deps.onAccepted;
      this.deps.store
        .transaction(tx => tx.getBorrower(application.borrowerId))
        .then(borrower => (borrower ? hook(borrower) : undefined))
        .catch(error => {
          console.error('[Lifecycle] Post-acceptance hook failed', {
            applicationId: application.id,
            error: describeError(error),
          });
        });
    }
  }

  private refreshStatistics(): void {
    this.deps.statistics.recompute().catch(error => {
      console.error('[Statistics] Recompute failed', { error: describeError(error) });
    });
  }
}
