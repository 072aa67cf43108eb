/**
 * REST API Types
 * Response envelope, credentials and wire shapes of the application resource.
 */

import { LenderId } from '../domain-types';
import { ApiClientType } from '../store/lifecycle-store';

// ============================================
// COMMON TYPES
// ============================================

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    correlationId?: string;
  };
}

// ============================================
// AUTHENTICATION
// ============================================

export interface ApiCredentials {
  apiKeyId: string;
  clientType: ApiClientType;
  userId: string;
  lenderId: LenderId | null;
}

declare global {
  namespace Express {
    interface Request {
      credentials?: ApiCredentials;
      correlationId?: string;
    }
  }
}

// ============================================
// APPLICATION TYPES
// ============================================

export interface ApplicationResponse {
  id: string;
  uuid: string;
  status: string;
  lenderId: string | null;
  creditProductId: string | null;
  amountRequested: number | null;
  pendingDocuments: boolean;
  expiredAt: string;
  acceptedAt: string | null;
  declinedAt: string | null;
  submittedAt: string | null;
  lenderStartedAt: string | null;
  informationRequestedAt: string | null;
  approvedAt: string | null;
  rejectedAt: string | null;
  contractUploadedAt: string | null;
  completedAt: string | null;
  lapsedAt: string | null;
  archivedAt: string | null;
  overduedAt: string | null;
  completedInDays: number | null;
  disbursedFinalAmount: number | null;
}
