import { Pool, PoolClient, QueryResultRow } from 'pg';
import {
  ActionId,
  ApplicationId,
  AwardId,
  BorrowerId,
  CreditProductId,
  JsonObject,
  LenderId,
  MessageId,
} from '../domain-types';
import {
  Application,
  ApplicationAction,
  ApplicationActionType,
  ApplicationPatch,
  ApplicationStatus,
  Award,
  Borrower,
  BorrowerPatch,
  BorrowerSize,
  BorrowerStatus,
  CreditProduct,
  isApplicationStatus,
  isBorrowerStatus,
  Lender,
  Message,
  MessageType,
  NewApplication,
  NewApplicationAction,
  NewAward,
  NewBorrower,
  NewMessage,
  StatisticType,
} from '../domain/application/application-types';
import { UniqueViolationError } from '../errors';
import {
  ApiClientType,
  ApiKeyRecord,
  ApplicationWindow,
  CredentialStore,
  LifecycleStore,
  StoreTransaction,
} from './lifecycle-store';

// ============================================
// ROW SHAPES
// ============================================

type AwardRow = {
  award_id: AwardId;
  source_contract_id: string;
  borrower_id: BorrowerId | null;
  buyer_name: string;
  title: string;
  description: string;
  amount: string;
  currency: string;
  procurement_category: string;
  procurement_method: string;
  contract_start_date: Date | null;
  contract_end_date: Date | null;
  award_date: Date | null;
  source_url: string;
  source_last_updated_at: Date | null;
  source_data: JsonObject;
  previous: boolean;
  created_at: Date;
};

type BorrowerRow = {
  borrower_id: BorrowerId;
  borrower_identifier: string;
  legal_name: string;
  legal_identifier: string;
  email: string;
  address: string;
  type: string;
  size: BorrowerSize;
  sector: string;
  status: BorrowerStatus;
  declined_at: Date | null;
  source_data: JsonObject;
  created_at: Date;
  updated_at: Date;
};

type ApplicationRow = {
  application_id: ApplicationId;
  uuid: string;
  award_borrower_identifier: string;
  status: ApplicationStatus;
  award_id: AwardId;
  borrower_id: BorrowerId;
  lender_id: LenderId | null;
  credit_product_id: CreditProductId | null;
  amount_requested: string | null;
  primary_email: string;
  expired_at: Date;
  accepted_at: Date | null;
  declined_at: Date | null;
  submitted_at: Date | null;
  lender_started_at: Date | null;
  information_requested_at: Date | null;
  approved_at: Date | null;
  rejected_at: Date | null;
  contract_uploaded_at: Date | null;
  completed_at: Date | null;
  lapsed_at: Date | null;
  archived_at: Date | null;
  overdued_at: Date | null;
  completed_in_days: number | null;
  pending_documents: boolean;
  declined_data: JsonObject;
  declined_preferences_data: JsonObject;
  approved_data: JsonObject;
  rejected_data: JsonObject;
  disbursed_final_amount: string | null;
  contract_amount_submitted: string | null;
  created_at: Date;
  updated_at: Date;
};

type MessageRow = {
  message_id: MessageId;
  application_id: ApplicationId;
  type: MessageType;
  external_message_id: string;
  body: string;
  lender_id: LenderId | null;
  created_at: Date;
};

type ActionRow = {
  action_id: ActionId;
  application_id: ApplicationId;
  type: ApplicationActionType;
  user_id: string | null;
  data: JsonObject;
  created_at: Date;
};

// ============================================
// COLUMN MAPS
// ============================================

type ColumnMap<P> = { [K in keyof P]-?: string };

const AWARD_COLUMNS: ColumnMap<NewAward> = {
  sourceContractId: 'source_contract_id',
  borrowerId: 'borrower_id',
  buyerName: 'buyer_name',
  title: 'title',
  description: 'description',
  amount: 'amount',
  currency: 'currency',
  procurementCategory: 'procurement_category',
  procurementMethod: 'procurement_method',
  contractStartDate: 'contract_start_date',
  contractEndDate: 'contract_end_date',
  awardDate: 'award_date',
  sourceUrl: 'source_url',
  sourceLastUpdatedAt: 'source_last_updated_at',
  sourceData: 'source_data',
  previous: 'previous',
  createdAt: 'created_at',
};

const BORROWER_COLUMNS: ColumnMap<BorrowerPatch & NewBorrower> = {
  borrowerIdentifier: 'borrower_identifier',
  legalName: 'legal_name',
  legalIdentifier: 'legal_identifier',
  email: 'email',
  address: 'address',
  type: 'type',
  size: 'size',
  sector: 'sector',
  status: 'status',
  declinedAt: 'declined_at',
  sourceData: 'source_data',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
};

const APPLICATION_COLUMNS: ColumnMap<NewApplication> = {
  uuid: 'uuid',
  awardBorrowerIdentifier: 'award_borrower_identifier',
  status: 'status',
  awardId: 'award_id',
  borrowerId: 'borrower_id',
  lenderId: 'lender_id',
  creditProductId: 'credit_product_id',
  amountRequested: 'amount_requested',
  primaryEmail: 'primary_email',
  expiredAt: 'expired_at',
  acceptedAt: 'accepted_at',
  declinedAt: 'declined_at',
  submittedAt: 'submitted_at',
  lenderStartedAt: 'lender_started_at',
  informationRequestedAt: 'information_requested_at',
  approvedAt: 'approved_at',
  rejectedAt: 'rejected_at',
  contractUploadedAt: 'contract_uploaded_at',
  completedAt: 'completed_at',
  lapsedAt: 'lapsed_at',
  archivedAt: 'archived_at',
  overduedAt: 'overdued_at',
  completedInDays: 'completed_in_days',
  pendingDocuments: 'pending_documents',
  declinedData: 'declined_data',
  declinedPreferencesData: 'declined_preferences_data',
  approvedData: 'approved_data',
  rejectedData: 'rejected_data',
  disbursedFinalAmount: 'disbursed_final_amount',
  contractAmountSubmitted: 'contract_amount_submitted',
  createdAt: 'created_at',
  updatedAt: 'updated_at',
};

function toColumnValues<P extends object>(values: P, columns: ColumnMap<P>): { names: string[]; params: unknown[] } {
  const names: string[] = [];
  const params: unknown[] = [];
  for (const key in columns) {
    const value = values[key];
    if (value === undefined) {
      continue;
    }
    names.push(columns[key]);
    params.push(value);
  }
  return { names, params };
}

function insertSql(table: string, names: string[]): string {
  const placeholders = names.map((_, index) => `$${index + 1}`);
  return `INSERT INTO ${table} (${names.join(', ')}) VALUES (${placeholders.join(', ')}) RETURNING *`;
}

function updateSql(table: string, idColumn: string, names: string[]): string {
  const assignments = names.map((name, index) => `${name} = $${index + 2}`);
  return `UPDATE ${table} SET ${assignments.join(', ')} WHERE ${idColumn} = $1 RETURNING *`;
}

// ============================================
// ROW MAPPERS
// ============================================

const toNumber = (value: string): number => Number(value);
const toNumberOrNull = (value: string | null): number | null => (value === null ? null : Number(value));

function mapAward(row: AwardRow): Award {
  return {
    id: row.award_id,
    sourceContractId: row.source_contract_id,
    borrowerId: row.borrower_id,
    buyerName: row.buyer_name,
    title: row.title,
    description: row.description,
    amount: toNumber(row.amount),
    currency: row.currency,
    procurementCategory: row.procurement_category,
    procurementMethod: row.procurement_method,
    contractStartDate: row.contract_start_date,
    contractEndDate: row.contract_end_date,
    awardDate: row.award_date,
    sourceUrl: row.source_url,
    sourceLastUpdatedAt: row.source_last_updated_at,
    sourceData: row.source_data,
    previous: row.previous,
    createdAt: row.created_at,
  };
}

function mapBorrower(row: BorrowerRow): Borrower {
  return {
    id: row.borrower_id,
    borrowerIdentifier: row.borrower_identifier,
    legalName: row.legal_name,
    legalIdentifier: row.legal_identifier,
    email: row.email,
    address: row.address,
    type: row.type,
    size: row.size,
    sector: row.sector,
    status: row.status,
    declinedAt: row.declined_at,
    sourceData: row.source_data,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapApplication(row: ApplicationRow): Application {
  return {
    id: row.application_id,
    uuid: row.uuid,
    awardBorrowerIdentifier: row.award_borrower_identifier,
    status: row.status,
    awardId: row.award_id,
    borrowerId: row.borrower_id,
    lenderId: row.lender_id,
    creditProductId: row.credit_product_id,
    amountRequested: toNumberOrNull(row.amount_requested),
    primaryEmail: row.primary_email,
    expiredAt: row.expired_at,
    acceptedAt: row.accepted_at,
    declinedAt: row.declined_at,
    submittedAt: row.submitted_at,
    lenderStartedAt: row.lender_started_at,
    informationRequestedAt: row.information_requested_at,
    approvedAt: row.approved_at,
    rejectedAt: row.rejected_at,
    contractUploadedAt: row.contract_uploaded_at,
    completedAt: row.completed_at,
    lapsedAt: row.lapsed_at,
    archivedAt: row.archived_at,
    overduedAt: row.overdued_at,
    completedInDays: row.completed_in_days,
    pendingDocuments: row.pending_documents,
    declinedData: row.declined_data,
    declinedPreferencesData: row.declined_preferences_data,
    approvedData: row.approved_data,
    rejectedData: row.rejected_data,
    disbursedFinalAmount: toNumberOrNull(row.disbursed_final_amount),
    contractAmountSubmitted: toNumberOrNull(row.contract_amount_submitted),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mapMessage(row: MessageRow): Message {
  return {
    id: row.message_id,
    applicationId: row.application_id,
    type: row.type,
    externalMessageId: row.external_message_id,
    body: row.body,
    lenderId: row.lender_id,
    createdAt: row.created_at,
  };
}

function mapAction(row: ActionRow): ApplicationAction {
  return {
    id: row.action_id,
    applicationId: row.application_id,
    type: row.type,
    userId: row.user_id,
    data: row.data,
    createdAt: row.created_at,
  };
}

function isUniqueViolation(error: unknown): error is Error & { code: string; constraint?: string } {
  return error instanceof Error && 'code' in error && error.code === '23505';
}

// ============================================
// TRANSACTION
// ============================================

class PgStoreTransaction implements StoreTransaction {
  constructor(private client: PoolClient) {}

  private async rows<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<R[]> {
    try {
      const result = await this.client.query<R>(sql, params);
      return result.rows;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new UniqueViolationError(error.constraint ?? 'unknown');
      }
      throw error;
    }
  }

  private async one<R extends QueryResultRow>(sql: string, params: unknown[] = []): Promise<R | null> {
    const rows = await this.rows<R>(sql, params);
    return rows[0] ?? null;
  }

  private async returning<R extends QueryResultRow>(sql: string, params: unknown[]): Promise<R> {
    const row = await this.one<R>(sql, params);
    if (!row) {
      throw new Error(`NO_ROW_RETURNED: ${sql.split(' ').slice(0, 3).join(' ')}`);
    }
    return row;
  }

  // === Awards ===

  async findAwardBySourceContractId(sourceContractId: string): Promise<Award | null> {
    const row = await this.one<AwardRow>('SELECT * FROM awards WHERE source_contract_id = $1', [sourceContractId]);
    return row ? mapAward(row) : null;
  }

  async getAward(id: AwardId): Promise<Award | null> {
    const row = await this.one<AwardRow>('SELECT * FROM awards WHERE award_id = $1', [id]);
    return row ? mapAward(row) : null;
  }

  async insertAward(award: NewAward): Promise<Award> {
    const { names, params } = toColumnValues<NewAward>(award, AWARD_COLUMNS);
    return mapAward(await this.returning<AwardRow>(insertSql('awards', names), params));
  }

  async updateAward(id: AwardId, patch: Partial<Pick<Award, 'previous' | 'borrowerId'>>): Promise<void> {
    const { names, params } = toColumnValues(patch, { previous: 'previous', borrowerId: 'borrower_id' });
    if (names.length === 0) {
      return;
    }
    await this.rows(updateSql('awards', 'award_id', names), [id, ...params]);
  }

  async latestAwardUpdate(): Promise<Date | null> {
    const row = await this.one<{ latest: Date | null }>('SELECT MAX(source_last_updated_at) AS latest FROM awards');
    return row?.latest ?? null;
  }

  // === Borrowers ===

  async findBorrowerByIdentifier(borrowerIdentifier: string): Promise<Borrower | null> {
    const row = await this.one<BorrowerRow>('SELECT * FROM borrowers WHERE borrower_identifier = $1', [borrowerIdentifier]);
    return row ? mapBorrower(row) : null;
  }

  async getBorrower(id: BorrowerId): Promise<Borrower | null> {
    const row = await this.one<BorrowerRow>('SELECT * FROM borrowers WHERE borrower_id = $1', [id]);
    return row ? mapBorrower(row) : null;
  }

  async insertBorrower(borrower: NewBorrower): Promise<Borrower> {
    const { names, params } = toColumnValues<NewBorrower>(borrower, BORROWER_COLUMNS);
    return mapBorrower(await this.returning<BorrowerRow>(insertSql('borrowers', names), params));
  }

  async updateBorrower(id: BorrowerId, patch: BorrowerPatch): Promise<Borrower> {
    const { names, params } = toColumnValues<BorrowerPatch>(patch, BORROWER_COLUMNS);
    if (names.length === 0) {
      const current = await this.getBorrower(id);
      if (!current) {
        throw new Error('BORROWER_NOT_FOUND');
      }
      return current;
    }
    return mapBorrower(await this.returning<BorrowerRow>(updateSql('borrowers', 'borrower_id', names), [id, ...params]));
  }

  // === Lenders ===

  async getLender(id: LenderId): Promise<Lender | null> {
    const row = await this.one<{ lender_id: LenderId; name: string; email_group: string; sla_days: number }>(
      'SELECT lender_id, name, email_group, sla_days FROM lenders WHERE lender_id = $1',
      [id]
    );
    return row ? { id: row.lender_id, name: row.name, emailGroup: row.email_group, slaDays: row.sla_days } : null;
  }

  async listLenders(): Promise<Lender[]> {
    const rows = await this.rows<{ lender_id: LenderId; name: string; email_group: string; sla_days: number }>(
      'SELECT lender_id, name, email_group, sla_days FROM lenders ORDER BY name'
    );
    return rows.map(row => ({ id: row.lender_id, name: row.name, emailGroup: row.email_group, slaDays: row.sla_days }));
  }

  async getCreditProduct(id: CreditProductId): Promise<CreditProduct | null> {
    const row = await this.one<{
      credit_product_id: CreditProductId;
      lender_id: LenderId;
      borrower_size: BorrowerSize;
      lower_limit: string;
      upper_limit: string;
    }>('SELECT * FROM credit_products WHERE credit_product_id = $1', [id]);
    return row
      ? {
          id: row.credit_product_id,
          lenderId: row.lender_id,
          borrowerSize: row.borrower_size,
          lowerLimit: toNumber(row.lower_limit),
          upperLimit: toNumber(row.upper_limit),
        }
      : null;
  }

  // === Applications ===

  async getApplication(id: ApplicationId, options: { forUpdate?: boolean } = {}): Promise<Application | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const row = await this.one<ApplicationRow>(`SELECT * FROM applications WHERE application_id = $1${lock}`, [id]);
    return row ? mapApplication(row) : null;
  }

  async findApplicationByUuid(uuid: string, options: { forUpdate?: boolean } = {}): Promise<Application | null> {
    const lock = options.forUpdate ? ' FOR UPDATE' : '';
    const row = await this.one<ApplicationRow>(`SELECT * FROM applications WHERE uuid = $1${lock}`, [uuid]);
    return row ? mapApplication(row) : null;
  }

  async findApplicationByDedupKey(awardBorrowerIdentifier: string): Promise<Application | null> {
    const row = await this.one<ApplicationRow>(
      'SELECT * FROM applications WHERE award_borrower_identifier = $1',
      [awardBorrowerIdentifier]
    );
    return row ? mapApplication(row) : null;
  }

  async insertApplication(application: NewApplication): Promise<Application> {
    const { names, params } = toColumnValues<NewApplication>(application, APPLICATION_COLUMNS);
    return mapApplication(await this.returning<ApplicationRow>(insertSql('applications', names), params));
  }

  async updateApplication(id: ApplicationId, patch: ApplicationPatch): Promise<Application> {
    const { names, params } = toColumnValues<ApplicationPatch>(patch, APPLICATION_COLUMNS);
    if (names.length === 0) {
      const current = await this.getApplication(id);
      if (!current) {
        throw new Error('APPLICATION_NOT_FOUND');
      }
      return current;
    }
    return mapApplication(
      await this.returning<ApplicationRow>(updateSql('applications', 'application_id', names), [id, ...params])
    );
  }

  async hasOtherUnarchivedApplications(borrowerId: BorrowerId, excludeId: ApplicationId): Promise<boolean> {
    const row = await this.one<{ exists: boolean }>(
      `SELECT EXISTS (
         SELECT 1 FROM applications
         WHERE borrower_id = $1 AND application_id <> $2 AND archived_at IS NULL
       ) AS exists`,
      [borrowerId, excludeId]
    );
    return row?.exists ?? false;
  }

  // === Sweep candidates ===

  async findIntroductionReminderCandidates(window: ApplicationWindow & { expiresBefore: Date }): Promise<Application[]> {
    const rows = await this.rows<ApplicationRow>(
      `SELECT a.* FROM applications a
       JOIN borrowers b ON b.borrower_id = a.borrower_id
       WHERE a.status = 'PENDING'
         AND a.expired_at > $1
         AND a.expired_at <= $2
         AND b.status = 'ACTIVE'
         AND NOT EXISTS (
           SELECT 1 FROM messages m
           WHERE m.application_id = a.application_id AND m.type = 'BORROWER_PENDING_APPLICATION_REMINDER'
         )
       ORDER BY a.expired_at`,
      [window.now, window.expiresBefore]
    );
    return rows.map(mapApplication);
  }

  async findSubmissionReminderCandidates(window: ApplicationWindow & { expiresBefore: Date }): Promise<Application[]> {
    const rows = await this.rows<ApplicationRow>(
      `SELECT a.* FROM applications a
       WHERE a.status = 'ACCEPTED'
         AND a.expired_at > $1
         AND a.expired_at <= $2
         AND NOT EXISTS (
           SELECT 1 FROM messages m
           WHERE m.application_id = a.application_id AND m.type = 'BORROWER_PENDING_SUBMIT_REMINDER'
         )
       ORDER BY a.expired_at`,
      [window.now, window.expiresBefore]
    );
    return rows.map(mapApplication);
  }

  async findLapseCandidates(window: ApplicationWindow & { enteredBefore: Date }): Promise<Application[]> {
    const rows = await this.rows<ApplicationRow>(
      `SELECT * FROM applications
       WHERE (status = 'PENDING' AND created_at < $1)
          OR (status = 'ACCEPTED' AND accepted_at < $1)
          OR (status = 'INFORMATION_REQUESTED' AND information_requested_at < $1)
       ORDER BY created_at`,
      [window.enteredBefore]
    );
    return rows.map(mapApplication);
  }

  async findArchivableCandidates(window: ApplicationWindow & { terminatedBefore: Date }): Promise<Application[]> {
    const rows = await this.rows<ApplicationRow>(
      `SELECT * FROM applications
       WHERE archived_at IS NULL
         AND (
           (status = 'DECLINED' AND declined_at < $1)
           OR (status = 'REJECTED' AND rejected_at < $1)
           OR (status = 'COMPLETED' AND completed_at < $1)
           OR (status = 'LAPSED' AND lapsed_at < $1)
         )
       ORDER BY created_at`,
      [window.terminatedBefore]
    );
    return rows.map(mapApplication);
  }

  async findApplicationsWithStatus(statuses: readonly ApplicationStatus[]): Promise<Application[]> {
    const rows = await this.rows<ApplicationRow>(
      'SELECT * FROM applications WHERE status = ANY($1::text[]) ORDER BY created_at',
      [statuses]
    );
    return rows.map(mapApplication);
  }

  // === Audit ===

  async insertMessage(message: NewMessage): Promise<Message> {
    const row = await this.returning<MessageRow>(
      `INSERT INTO messages (application_id, type, external_message_id, body, lender_id, created_at)
       VALUES ($1, $2, $3, $4, $5, $6) RETURNING *`,
      [message.applicationId, message.type, message.externalMessageId, message.body, message.lenderId, message.createdAt]
    );
    return mapMessage(row);
  }

  async hasMessage(applicationId: ApplicationId, type: MessageType): Promise<boolean> {
    const row = await this.one<{ exists: boolean }>(
      'SELECT EXISTS (SELECT 1 FROM messages WHERE application_id = $1 AND type = $2) AS exists',
      [applicationId, type]
    );
    return row?.exists ?? false;
  }

  async listMessages(applicationId: ApplicationId): Promise<Message[]> {
    const rows = await this.rows<MessageRow>(
      'SELECT * FROM messages WHERE application_id = $1 ORDER BY created_at, message_id',
      [applicationId]
    );
    return rows.map(mapMessage);
  }

  async insertAction(action: NewApplicationAction): Promise<ApplicationAction> {
    const row = await this.returning<ActionRow>(
      `INSERT INTO application_actions (application_id, type, user_id, data, created_at)
       VALUES ($1, $2, $3, $4, $5) RETURNING *`,
      [action.applicationId, action.type, action.userId, action.data, action.createdAt]
    );
    return mapAction(row);
  }

  async listActions(applicationId: ApplicationId, types?: readonly ApplicationActionType[]): Promise<ApplicationAction[]> {
    const rows = types
      ? await this.rows<ActionRow>(
          `SELECT * FROM application_actions
           WHERE application_id = $1 AND type = ANY($2::text[])
           ORDER BY created_at, action_id`,
          [applicationId, types]
        )
      : await this.rows<ActionRow>(
          'SELECT * FROM application_actions WHERE application_id = $1 ORDER BY created_at, action_id',
          [applicationId]
        );
    return rows.map(mapAction);
  }

  // === Documents ===

  async deleteDocuments(applicationId: ApplicationId): Promise<number> {
    const rows = await this.rows<{ document_id: string }>(
      'DELETE FROM borrower_documents WHERE application_id = $1 RETURNING document_id',
      [applicationId]
    );
    return rows.length;
  }

  // === Statistics ===

  async countApplicationsByStatus(lenderId?: LenderId): Promise<Partial<Record<ApplicationStatus, number>>> {
    const rows = lenderId
      ? await this.rows<{ status: string; count: number }>(
          'SELECT status, COUNT(*)::int AS count FROM applications WHERE lender_id = $1 GROUP BY status',
          [lenderId]
        )
      : await this.rows<{ status: string; count: number }>(
          'SELECT status, COUNT(*)::int AS count FROM applications GROUP BY status'
        );
    const counts: Partial<Record<ApplicationStatus, number>> = {};
    for (const row of rows) {
      if (isApplicationStatus(row.status)) {
        counts[row.status] = row.count;
      }
    }
    return counts;
  }

  async countBorrowersByStatus(): Promise<Partial<Record<BorrowerStatus, number>>> {
    const rows = await this.rows<{ status: string; count: number }>(
      'SELECT status, COUNT(*)::int AS count FROM borrowers GROUP BY status'
    );
    const counts: Partial<Record<BorrowerStatus, number>> = {};
    for (const row of rows) {
      if (isBorrowerStatus(row.status)) {
        counts[row.status] = row.count;
      }
    }
    return counts;
  }

  async upsertStatistic(statistic: {
    type: StatisticType;
    lenderId: LenderId | null;
    data: JsonObject;
    day: Date;
  }): Promise<void> {
    await this.rows(
      `INSERT INTO statistics (type, lender_id, day, data, created_at)
       VALUES ($1, $2, $3::date, $4, $5)
       ON CONFLICT (day, type, COALESCE(lender_id, '00000000-0000-0000-0000-000000000000'::uuid))
       DO UPDATE SET data = EXCLUDED.data, created_at = EXCLUDED.created_at`,
      [statistic.type, statistic.lenderId, statistic.day.toISOString().slice(0, 10), statistic.data, statistic.day]
    );
  }
}

// ============================================
// STORE
// ============================================

export class PgLifecycleStore implements LifecycleStore, CredentialStore {
  constructor(private pool: Pool) {}

  async transaction<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(new PgStoreTransaction(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async findApiKeyByHash(keyHash: string): Promise<ApiKeyRecord | null> {
    const result = await this.pool.query<{
      api_key_id: string;
      client_type: ApiClientType;
      user_id: string;
      lender_id: LenderId | null;
      expires_at: Date | null;
      revoked_at: Date | null;
    }>(
      `SELECT api_key_id, client_type, user_id, lender_id, expires_at, revoked_at
       FROM api_keys
       WHERE api_key_hash = $1`,
      [keyHash]
    );
    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      apiKeyId: row.api_key_id,
      clientType: row.client_type,
      userId: row.user_id,
      lenderId: row.lender_id,
      expiresAt: row.expires_at,
      revokedAt: row.revoked_at,
    };
  }
}
