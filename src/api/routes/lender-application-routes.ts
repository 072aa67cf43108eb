import { Router, Request } from 'express';
import { ApplicationId } from '../../domain-types';
import { LifecycleService } from '../../application/lifecycle-service';
import { actorFromCredentials } from '../middleware/auth';
import {
  applicationIdSchema,
  approveSchema,
  completeSchema,
  rejectSchema,
  requestInformationSchema,
} from '../schemas/application-schemas';
import { asyncHandler, sendData, toApplicationResponse } from './route-helpers';

function idParam(req: Request): ApplicationId {
  return applicationIdSchema.parse(req.params.id);
}

/**
 * Lender back-office endpoints. A LENDER key only reaches applications
 * assigned to its lender; the state machine enforces that.
 */
export function createLenderApplicationRoutes(lifecycle: LifecycleService): Router {
  const router = Router();

  router.post('/:id/start', asyncHandler(async (req, res) => {
    const application = await lifecycle.transitionById(idParam(req), { type: 'START' }, actorFromCredentials(req.credentials));
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:id/request-information', asyncHandler(async (req, res) => {
    const { message } = requestInformationSchema.parse(req.body);
    const application = await lifecycle.transitionById(
      idParam(req),
      { type: 'REQUEST_INFORMATION', message },
      actorFromCredentials(req.credentials)
    );
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:id/approve', asyncHandler(async (req, res) => {
    const { approvedData } = approveSchema.parse(req.body);
    const application = await lifecycle.transitionById(
      idParam(req),
      { type: 'APPROVE', approvedData },
      actorFromCredentials(req.credentials)
    );
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:id/reject', asyncHandler(async (req, res) => {
    const { rejectedData } = rejectSchema.parse(req.body);
    const application = await lifecycle.transitionById(
      idParam(req),
      { type: 'REJECT', rejectedData },
      actorFromCredentials(req.credentials)
    );
    sendData(res, toApplicationResponse(application));
  }));

  router.post('/:id/complete', asyncHandler(async (req, res) => {
    const body = completeSchema.parse(req.body);
    const application = await lifecycle.complete(idParam(req), body, actorFromCredentials(req.credentials));
    sendData(res, toApplicationResponse(application));
  }));

  return router;
}
