import {
  ApplicationAlreadyCopiedError,
  ApplicationArchivedError,
  ApplicationExpiredError,
  ForbiddenActorError,
  InvalidStateTransitionError,
  MissingLenderError,
} from '../../errors';
import {
  Actor,
  ActorKind,
  Application,
  ApplicationAction,
  ApplicationPatch,
  ApplicationStatus,
  LifecycleEvent,
  LifecycleEventType,
  SideEffect,
  TransitionContext,
  TransitionResult,
} from './application-types';

interface TransitionRule {
  from: readonly ApplicationStatus[];
  // null keeps the current status
  to: ApplicationStatus | null;
  actors: readonly ActorKind[];
  expiryGuard: boolean;
}

const BORROWER: readonly ActorKind[] = ['BORROWER', 'ADMIN'];
const LENDER: readonly ActorKind[] = ['LENDER', 'ADMIN'];

/**
 * Transition table. Source status must match exactly; there are no
 * "compatible" statuses.
 */
export const TRANSITIONS: Record<LifecycleEventType, TransitionRule> = {
  ACCEPT: { from: ['PENDING'], to: 'ACCEPTED', actors: BORROWER, expiryGuard: true },
  DECLINE: { from: ['PENDING'], to: 'DECLINED', actors: BORROWER, expiryGuard: true },
  ROLLBACK_DECLINE: { from: ['DECLINED'], to: 'PENDING', actors: BORROWER, expiryGuard: true },
  DECLINE_FEEDBACK: { from: ['DECLINED'], to: null, actors: BORROWER, expiryGuard: true },
  CONFIRM_CREDIT_PRODUCT: { from: ['ACCEPTED'], to: null, actors: BORROWER, expiryGuard: false },
  SUBMIT: { from: ['ACCEPTED'], to: 'SUBMITTED', actors: BORROWER, expiryGuard: false },
  START: { from: ['SUBMITTED'], to: 'STARTED', actors: LENDER, expiryGuard: false },
  REQUEST_INFORMATION: { from: ['STARTED'], to: 'INFORMATION_REQUESTED', actors: LENDER, expiryGuard: false },
  COMPLETE_INFORMATION_REQUEST: { from: ['INFORMATION_REQUESTED'], to: 'STARTED', actors: BORROWER, expiryGuard: false },
  APPROVE: { from: ['STARTED'], to: 'APPROVED', actors: LENDER, expiryGuard: false },
  UPLOAD_CONTRACT: { from: ['APPROVED'], to: 'CONTRACT_UPLOADED', actors: BORROWER, expiryGuard: false },
  COMPLETE: { from: ['CONTRACT_UPLOADED'], to: 'COMPLETED', actors: LENDER, expiryGuard: false },
  REJECT: { from: ['STARTED', 'CONTRACT_UPLOADED'], to: 'REJECTED', actors: LENDER, expiryGuard: false },
  LAPSE: {
    from: ['PENDING', 'ACCEPTED', 'INFORMATION_REQUESTED'],
    to: 'LAPSED',
    actors: ['SYSTEM', 'ADMIN'],
    expiryGuard: false,
  },
};

export function actorUserId(actor: Actor): string | null {
  switch (actor.kind) {
    case 'LENDER':
    case 'ADMIN':
      return actor.userId;
    case 'BORROWER':
    case 'SYSTEM':
      return null;
  }
}

function checkActor(application: Application, rule: TransitionRule, actor: Actor): ForbiddenActorError | null {
  if (!rule.actors.includes(actor.kind)) {
    return new ForbiddenActorError(`Actor ${actor.kind} may not perform this operation`, {
      applicationId: application.id,
    });
  }
  if (actor.kind === 'LENDER' && application.lenderId !== actor.lenderId) {
    return new ForbiddenActorError('Application is not assigned to this lender', {
      applicationId: application.id,
      lenderId: actor.lenderId,
    });
  }
  return null;
}

/**
 * Pure transition function. Validates the event against the application's
 * persisted state and returns the patch and side effects to apply in one
 * unit of work. Never performs I/O.
 */
export function planTransition(
  application: Application,
  event: LifecycleEvent,
  context: TransitionContext
): TransitionResult {
  const rule = TRANSITIONS[event.type];

  if (!rule.from.includes(application.status)) {
    return { ok: false, error: new InvalidStateTransitionError(application.status, event.type, rule.from) };
  }

  const forbidden = checkActor(application, rule, context.actor);
  if (forbidden) {
    return { ok: false, error: forbidden };
  }

  if (rule.expiryGuard && application.expiredAt.getTime() < context.now.getTime()) {
    return { ok: false, error: new ApplicationExpiredError({ applicationId: application.id, expiredAt: application.expiredAt }) };
  }

  const status = rule.to ?? application.status;
  const { now } = context;
  let patch: ApplicationPatch;
  let effects: SideEffect[];

  switch (event.type) {
    case 'ACCEPT':
      patch = { acceptedAt: now };
      effects = [{ kind: 'RECORD_ACTION', actionType: 'BORROWER_ACCEPTED_INVITATION', data: {} }];
      break;

    case 'DECLINE': {
      const declinedData = { declineThis: event.declineThis, declineAll: event.declineAll };
      patch = { declinedAt: now, declinedData };
      effects = [{ kind: 'RECORD_ACTION', actionType: 'BORROWER_DECLINED_INVITATION', data: declinedData }];
      if (event.declineAll) {
        effects.push({ kind: 'SET_BORROWER_STATUS', status: 'DECLINED_ALL_OPPORTUNITIES' });
      }
      break;
    }

    case 'ROLLBACK_DECLINE':
      // Once personal data is erased there is nothing left to restore
      if (application.archivedAt) {
        return { ok: false, error: new ApplicationArchivedError({ applicationId: application.id }) };
      }
      patch = { declinedAt: null, declinedData: {} };
      effects = [{ kind: 'RECORD_ACTION', actionType: 'BORROWER_ROLLBACK_DECLINE', data: {} }];
      if (application.declinedData.declineAll === true) {
        effects.push({ kind: 'SET_BORROWER_STATUS', status: 'ACTIVE' });
      }
      break;

    case 'DECLINE_FEEDBACK':
      patch = { declinedPreferencesData: event.feedback };
      effects = [{ kind: 'RECORD_ACTION', actionType: 'BORROWER_DECLINE_FEEDBACK', data: event.feedback }];
      break;

    case 'CONFIRM_CREDIT_PRODUCT':
      patch = {
        lenderId: event.lenderId,
        creditProductId: event.creditProductId,
        amountRequested: event.amountRequested,
      };
      effects = [
        {
          kind: 'RECORD_ACTION',
          actionType: 'APPLICATION_CONFIRM_CREDIT_PRODUCT',
          data: {
            lenderId: event.lenderId,
            creditProductId: event.creditProductId,
            amountRequested: event.amountRequested,
          },
        },
      ];
      break;

    case 'SUBMIT':
      if (!application.lenderId || !application.creditProductId) {
        return { ok: false, error: new MissingLenderError({ applicationId: application.id }) };
      }
      patch = { submittedAt: now, pendingDocuments: false };
      effects = [
        { kind: 'RECORD_ACTION', actionType: 'BORROWER_SUBMITTED_APPLICATION', data: {} },
        { kind: 'NOTIFY', messageType: 'SUBMISSION_COMPLETE', recipient: 'BORROWER' },
        { kind: 'NOTIFY', messageType: 'NEW_APPLICATION_LENDER', recipient: 'LENDER' },
        { kind: 'NOTIFY', messageType: 'NEW_APPLICATION_ADMIN', recipient: 'ADMIN' },
      ];
      break;

    case 'START':
      patch = { lenderStartedAt: now };
      effects = [{ kind: 'RECORD_ACTION', actionType: 'LENDER_STARTED_APPLICATION', data: {} }];
      break;

    case 'REQUEST_INFORMATION':
      patch = { informationRequestedAt: now, pendingDocuments: true };
      effects = [
        { kind: 'RECORD_ACTION', actionType: 'LENDER_REQUEST_INFORMATION', data: { message: event.message } },
        { kind: 'NOTIFY', messageType: 'LENDER_MESSAGE', recipient: 'BORROWER', body: event.message },
      ];
      break;

    case 'COMPLETE_INFORMATION_REQUEST':
      patch = { pendingDocuments: false };
      effects = [
        { kind: 'RECORD_ACTION', actionType: 'BORROWER_UPLOAD_ADDITIONAL_DOCUMENT_COMPLETED', data: {} },
        { kind: 'NOTIFY', messageType: 'BORROWER_DOCUMENT_UPDATED', recipient: 'LENDER' },
      ];
      break;

    case 'APPROVE':
      patch = { approvedAt: now, approvedData: event.approvedData };
      effects = [
        { kind: 'RECORD_ACTION', actionType: 'APPROVED_APPLICATION', data: event.approvedData },
        { kind: 'NOTIFY', messageType: 'APPROVED_APPLICATION', recipient: 'BORROWER' },
      ];
      break;

    case 'UPLOAD_CONTRACT':
      patch = { contractUploadedAt: now, contractAmountSubmitted: event.contractAmountSubmitted };
      effects = [
        {
          kind: 'RECORD_ACTION',
          actionType: 'BORROWER_UPLOAD_CONTRACT',
          data: { contractAmountSubmitted: event.contractAmountSubmitted },
        },
        { kind: 'NOTIFY', messageType: 'CONTRACT_UPLOAD_CONFIRMATION', recipient: 'BORROWER' },
        { kind: 'NOTIFY', messageType: 'CONTRACT_UPLOAD_CONFIRMATION_TO_LENDER', recipient: 'LENDER' },
      ];
      break;

    case 'COMPLETE':
      patch = {
        completedAt: now,
        disbursedFinalAmount: event.disbursedFinalAmount,
        completedInDays: event.completedInDays,
      };
      effects = [
        {
          kind: 'RECORD_ACTION',
          actionType: 'LENDER_COMPLETE_APPLICATION',
          data: { disbursedFinalAmount: event.disbursedFinalAmount },
        },
        { kind: 'NOTIFY', messageType: 'CREDIT_DISBURSED', recipient: 'BORROWER' },
      ];
      break;

    case 'REJECT':
      patch = { rejectedAt: now, rejectedData: event.rejectedData };
      effects = [
        { kind: 'RECORD_ACTION', actionType: 'REJECTED_APPLICATION', data: event.rejectedData },
        { kind: 'NOTIFY', messageType: 'REJECTED_APPLICATION', recipient: 'BORROWER' },
      ];
      break;

    case 'LAPSE':
      patch = { lapsedAt: now };
      effects = [{ kind: 'RECORD_ACTION', actionType: 'APPLICATION_LAPSED', data: { previousStatus: application.status } }];
      break;
  }

  return { ok: true, status, patch: { ...patch, status }, effects };
}

/**
 * Guard for "find alternative credit": the source must be REJECTED, still
 * hold its data and not already have been copied.
 */
export function checkCopyAllowed(
  application: Application,
  actions: readonly ApplicationAction[]
): InvalidStateTransitionError | ApplicationArchivedError | ApplicationAlreadyCopiedError | null {
  if (application.status !== 'REJECTED') {
    return new InvalidStateTransitionError(application.status, 'FIND_ALTERNATIVE_CREDIT', ['REJECTED']);
  }
  if (application.archivedAt) {
    return new ApplicationArchivedError({ applicationId: application.id });
  }
  if (actions.some(action => action.type === 'COPIED_APPLICATION')) {
    return new ApplicationAlreadyCopiedError({ applicationId: application.id });
  }
  return null;
}
