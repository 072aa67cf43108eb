export type RawRecord = Record<string, unknown>;

export interface AwardPageQuery {
  offset: number;
  limit: number;
  fromDate: Date;
  untilDate: Date | null;
}

/**
 * External open-data source of procurement awards. Every method returns the
 * raw records of one request; an empty award page ends pagination.
 */
export interface AwardSource {
  fetchAwardsPage(query: AwardPageQuery): Promise<RawRecord[]>;
  fetchAwardByIdAndSupplier(awardId: string, supplierId: string): Promise<RawRecord[]>;
  fetchBorrower(supplierId: string): Promise<RawRecord[]>;
  fetchBorrowerEmails(supplierId: string): Promise<RawRecord[]>;
  fetchPreviousContracts(supplierId: string): Promise<RawRecord[]>;
}
