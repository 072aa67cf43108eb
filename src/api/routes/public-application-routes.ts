import { Router, Request } from 'express';
import { LifecycleService } from '../../application/lifecycle-service';
import {
  applicationUuidSchema,
  confirmCreditProductSchema,
  declineFeedbackSchema,
  declineSchema,
  uploadContractSchema,
} from '../schemas/application-schemas';
import { asyncHandler, sendData, toApplicationResponse } from './route-helpers';

function uuidParam(req: Request): string {
  return applicationUuidSchema.parse(req.params.uuid);
}

/**
 * Borrower-facing endpoints. The opaque application uuid from the invitation
 * link is the only credential.
 */
export function createPublicApplicationRoutes(lifecycle: LifecycleService): Router {
  const router = Router();

  router.get('/:uuid', asyncHandler(async (req, res) => {
    const application = await lifecycle.getByUuid(uuidParam(req));
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/accept', asyncHandler(async (req, res) => {
    const application = await lifecycle.transitionByUuid(uuidParam(req), { type: 'ACCEPT' });
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/decline', asyncHandler(async (req, res) => {
    const body = declineSchema.parse(req.body);
    const application = await lifecycle.transitionByUuid(uuidParam(req), { type: 'DECLINE', ...body });
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/rollback-decline', asyncHandler(async (req, res) => {
    const application = await lifecycle.transitionByUuid(uuidParam(req), { type: 'ROLLBACK_DECLINE' });
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/decline-feedback', asyncHandler(async (req, res) => {
    const { feedback } = declineFeedbackSchema.parse(req.body);
    const application = await lifecycle.transitionByUuid(uuidParam(req), { type: 'DECLINE_FEEDBACK', feedback });
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/confirm-credit-product', asyncHandler(async (req, res) => {
    const body = confirmCreditProductSchema.parse(req.body);
    const application = await lifecycle.confirmCreditProduct(uuidParam(req), body);
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/submit', asyncHandler(async (req, res) => {
    const application = await lifecycle.transitionByUuid(uuidParam(req), { type: 'SUBMIT' });
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/complete-information-request', asyncHandler(async (req, res) => {
    const application = await lifecycle.transitionByUuid(uuidParam(req), { type: 'COMPLETE_INFORMATION_REQUEST' });
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/upload-contract', asyncHandler(async (req, res) => {
    const { contractAmountSubmitted } = uploadContractSchema.parse(req.body);
    const application = await lifecycle.transitionByUuid(uuidParam(req), {
      type: 'UPLOAD_CONTRACT',
      contractAmountSubmitted,
    });
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:uuid/find-alternative-credit', asyncHandler(async (req, res) => {
    const { copy } = await lifecycle.findAlternativeCredit(uuidParam(req));
    sendData(res, toApplicationResponse(copy), 201);
  }));

  return router;
}
