/**
 * DOMAIN PRIMITIVES
 * Branded identifiers, the clock and UTC day arithmetic shared by every module.
 */

// === BRANDED TYPES ===
export type ApplicationId = string & { readonly brand: 'ApplicationId' };
export type AwardId = string & { readonly brand: 'AwardId' };
export type BorrowerId = string & { readonly brand: 'BorrowerId' };
export type LenderId = string & { readonly brand: 'LenderId' };
export type CreditProductId = string & { readonly brand: 'CreditProductId' };
export type MessageId = string & { readonly brand: 'MessageId' };
export type ActionId = string & { readonly brand: 'ActionId' };
export type DocumentId = string & { readonly brand: 'DocumentId' };

export type JsonObject = Record<string, unknown>;

// === ID FACTORY ===
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

function uuidOf(value: string, kind: string): string {
  if (!UUID_PATTERN.test(value)) {
    throw new Error(`${kind}_INVALID: "${value}"`);
  }
  return value.toLowerCase();
}

export const Ids = {
  application: (value: string): ApplicationId => uuidOf(value, 'APPLICATION_ID') as ApplicationId,
  award: (value: string): AwardId => uuidOf(value, 'AWARD_ID') as AwardId,
  borrower: (value: string): BorrowerId => uuidOf(value, 'BORROWER_ID') as BorrowerId,
  lender: (value: string): LenderId => uuidOf(value, 'LENDER_ID') as LenderId,
  creditProduct: (value: string): CreditProductId => uuidOf(value, 'CREDIT_PRODUCT_ID') as CreditProductId,
  message: (value: string): MessageId => uuidOf(value, 'MESSAGE_ID') as MessageId,
  action: (value: string): ActionId => uuidOf(value, 'ACTION_ID') as ActionId,
  document: (value: string): DocumentId => uuidOf(value, 'DOCUMENT_ID') as DocumentId,
};

// === CLOCK ===
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

// === UTC DAY ARITHMETIC ===
// All day math is done on UTC milliseconds; local time zones never enter the calculation.
export const DAY_MS = 24 * 60 * 60 * 1000;

export function addUtcDays(base: Date, days: number): Date {
  return new Date(base.getTime() + days * DAY_MS);
}

/**
 * Whole days elapsed from `from` to `to`, rounded down. Negative spans count as zero.
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  const elapsed = to.getTime() - from.getTime();
  if (elapsed <= 0) {
    return 0;
  }
  return Math.floor(elapsed / DAY_MS);
}

export function toIsoStringOrNull(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}
