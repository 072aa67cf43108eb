import { z } from 'zod';
import { Ids } from '../../domain-types';

const jsonObject = z.record(z.unknown());

// ============================================
// BORROWER (public, keyed by the application uuid)
// ============================================

export const applicationUuidSchema = z.string().uuid();

export const declineSchema = z.object({
  declineThis: z.boolean(),
  declineAll: z.boolean(),
});

export const declineFeedbackSchema = z.object({
  feedback: jsonObject,
});

export const confirmCreditProductSchema = z.object({
  creditProductId: z.string().uuid().transform(Ids.creditProduct),
  amountRequested: z.number().positive(),
});

export const uploadContractSchema = z.object({
  contractAmountSubmitted: z.number().nonnegative().nullable().default(null),
});

// ============================================
// LENDER
// ============================================

export const applicationIdSchema = z.string().uuid().transform(Ids.application);

export const requestInformationSchema = z.object({
  message: z.string().trim().min(1).max(4000),
});

export const approveSchema = z.object({
  approvedData: jsonObject.default({}),
});

export const rejectSchema = z.object({
  rejectedData: jsonObject.default({}),
});

export const completeSchema = z.object({
  disbursedFinalAmount: z.number().nonnegative(),
});

// ============================================
// ADMIN
// ============================================

export const fetchAwardsSchema = z
  .object({
    fromDate: z.coerce.date().optional(),
    untilDate: z.coerce.date().optional(),
  })
  .refine(value => (value.fromDate === undefined) === (value.untilDate === undefined), {
    message: 'fromDate and untilDate must be given together',
  })
  .refine(value => !value.fromDate || !value.untilDate || value.fromDate <= value.untilDate, {
    message: 'fromDate must not be after untilDate',
  });

export const fetchAwardSchema = z.object({
  awardId: z.string().trim().min(1),
  supplierId: z.string().trim().min(1),
});
