import { Request, Response, NextFunction, RequestHandler } from 'express';
import { toIsoStringOrNull } from '../../domain-types';
import { Application } from '../../domain/application/application-types';
import { ApiResponse, ApplicationResponse } from '../types';

export function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function sendData<T>(res: Response, data: T, status: number = 200): void {
  const response: ApiResponse<T> = { success: true, data };
  res.status(status).json(response);
}

export function toApplicationResponse(application: Application): ApplicationResponse {
  return {
    id: application.id,
    uuid: application.uuid,
    status: application.status,
    lenderId: application.lenderId,
    creditProductId: application.creditProductId,
    amountRequested: application.amountRequested,
    pendingDocuments: application.pendingDocuments,
    expiredAt: application.expiredAt.toISOString(),
    acceptedAt: toIsoStringOrNull(application.acceptedAt),
    declinedAt: toIsoStringOrNull(application.declinedAt),
    submittedAt: toIsoStringOrNull(application.submittedAt),
    lenderStartedAt: toIsoStringOrNull(application.lenderStartedAt),
    informationRequestedAt: toIsoStringOrNull(application.informationRequestedAt),
    approvedAt: toIsoStringOrNull(application.approvedAt),
    rejectedAt: toIsoStringOrNull(application.rejectedAt),
    contractUploadedAt: toIsoStringOrNull(application.contractUploadedAt),
    completedAt: toIsoStringOrNull(application.completedAt),
    lapsedAt: toIsoStringOrNull(application.lapsedAt),
    archivedAt: toIsoStringOrNull(application.archivedAt),
    overduedAt: toIsoStringOrNull(application.overduedAt),
    completedInDays: application.completedInDays,
    disbursedFinalAmount: application.disbursedFinalAmount,
  };
}
