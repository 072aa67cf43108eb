import { z } from 'zod';
import { BorrowerId, JsonObject } from '../domain-types';
import { Borrower, BorrowerPatch, NewAward, NewBorrower } from '../domain/application/application-types';
import { SkippedAwardError, SourceFormatError } from '../errors';
import { RawRecord } from './award-source';

export const REQUIRED_AWARD_FIELDS = ['id_del_portafolio', 'nit_del_proveedor_adjudicado'] as const;

const UNDEFINED_SUPPLIER = 'No Definido';
const NOT_PROVIDED = 'No provisto';

const emailSchema = z.string().email();

function text(record: RawRecord, key: string): string {
  const value = record[key];
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return '';
}

function amount(record: RawRecord, key: string): number {
  const parsed = Number(text(record, key));
  return Number.isFinite(parsed) ? parsed : 0;
}

function nestedUrl(record: RawRecord, key: string): string {
  const value = record[key];
  if (value && typeof value === 'object' && 'url' in value && typeof value.url === 'string') {
    return value.url;
  }
  return typeof value === 'string' ? value : '';
}

/**
 * Parses a floating source timestamp as UTC. Unparseable values become null.
 */
export function parseSourceDate(value: string): Date | null {
  if (!value) {
    return null;
  }
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/.test(value);
  const parsed = new Date(hasZone ? value : `${value}Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

// ============================================
// AWARD RECORDS
// ============================================

/**
 * A record without its natural-key fields means the upstream contract changed;
 * the whole sweep must stop.
 */
export function assertAwardRecordShape(record: RawRecord): void {
  const missing = REQUIRED_AWARD_FIELDS.filter(field => !(field in record));
  if (missing.length > 0) {
    throw new SourceFormatError(`Source award is missing required fields: ${missing.join(', ')}`, { missing, record });
  }
}

export function getSupplierId(record: RawRecord): string {
  const supplierId = text(record, 'nit_del_proveedor_adjudicado');
  if (!supplierId || supplierId === UNDEFINED_SUPPLIER) {
    throw new SkippedAwardError('Supplier identifier is not defined', {
      sourceContractId: text(record, 'id_del_portafolio'),
    });
  }
  return supplierId;
}

export function getSourceContractId(record: RawRecord): string {
  const sourceContractId = text(record, 'id_del_portafolio');
  if (!sourceContractId) {
    throw new SkippedAwardError('Award has no source contract id', { record });
  }
  return sourceContractId;
}

export function mapAwardRecord(
  record: RawRecord,
  options: { borrowerId: BorrowerId | null; previous: boolean; now: Date }
): NewAward {
  return {
    sourceContractId: getSourceContractId(record),
    borrowerId: options.borrowerId,
    buyerName: text(record, 'entidad'),
    title: text(record, 'nombre_del_procedimiento'),
    description: text(record, 'descripci_n_del_procedimiento'),
    amount: amount(record, 'valor_total_adjudicacion'),
    currency: 'COP',
    procurementCategory: text(record, 'tipo_de_contrato'),
    procurementMethod: text(record, 'modalidad_de_contratacion'),
    contractStartDate: null,
    contractEndDate: null,
    awardDate: parseSourceDate(text(record, 'fecha_adjudicacion')),
    sourceUrl: nestedUrl(record, 'urlproceso'),
    sourceLastUpdatedAt: parseSourceDate(text(record, 'fecha_de_ultima_publicaci')),
    sourceData: record,
    previous: options.previous,
    createdAt: options.now,
  };
}

/**
 * Contract-history records come from a different dataset with its own field
 * names. Returns null for records without a contract id.
 */
export function mapPreviousContractRecord(
  record: RawRecord,
  options: { borrowerId: BorrowerId; now: Date }
): NewAward | null {
  const sourceContractId = text(record, 'id_contrato');
  if (!sourceContractId) {
    return null;
  }
  return {
    sourceContractId,
    borrowerId: options.borrowerId,
    buyerName: text(record, 'nombre_entidad'),
    title: text(record, 'objeto_del_contrato'),
    description: text(record, 'descripcion_del_proceso'),
    amount: amount(record, 'valor_del_contrato'),
    currency: 'COP',
    procurementCategory: text(record, 'tipo_de_contrato'),
    procurementMethod: text(record, 'modalidad_de_contratacion'),
    contractStartDate: parseSourceDate(text(record, 'fecha_de_inicio_del_contrato')),
    contractEndDate: parseSourceDate(text(record, 'fecha_de_fin_del_contrato')),
    awardDate: parseSourceDate(text(record, 'fecha_de_firma')),
    sourceUrl: nestedUrl(record, 'urlproceso'),
    sourceLastUpdatedAt: parseSourceDate(text(record, 'ultima_actualizacion')),
    sourceData: record,
    previous: true,
    createdAt: options.now,
  };
}

// ============================================
// BORROWER RECORDS
// ============================================

/**
 * Picks the borrower's email from the email dataset. No email, an invalid
 * email, or conflicting emails are per-record skips.
 */
export function selectBorrowerEmail(records: readonly RawRecord[], supplierId: string): string {
  if (records.length === 0) {
    throw new SkippedAwardError('No email for borrower', { supplierId });
  }
  const email = text(records[0], 'correo_entidad');
  if (!emailSchema.safeParse(email).success) {
    throw new SkippedAwardError('Borrower has no valid email address', { supplierId });
  }
  if (records.some(record => text(record, 'correo_entidad') !== email)) {
    throw new SkippedAwardError('More than one email for borrower', { supplierId });
  }
  return email;
}

export function selectBorrowerRecord(records: readonly RawRecord[], supplierId: string): RawRecord {
  if (records.length === 0) {
    throw new SkippedAwardError('No borrower found for supplier', { supplierId });
  }
  if (records.length > 1) {
    throw new SkippedAwardError('More than one borrower for this borrower identifier', { supplierId });
  }
  return records[0];
}

export function mapBorrowerRecord(
  record: RawRecord,
  options: { borrowerIdentifier: string; supplierId: string; email: string; now: Date }
): NewBorrower {
  const orNotProvided = (key: string): string => text(record, key) || NOT_PROVIDED;
  return {
    borrowerIdentifier: options.borrowerIdentifier,
    legalName: text(record, 'nombre_entidad'),
    legalIdentifier: text(record, 'nit_entidad') || options.supplierId,
    email: options.email,
    address: [
      `Direccion: ${orNotProvided('direccion')}`,
      `Ciudad: ${orNotProvided('ciudad')}`,
      `Provincia: ${orNotProvided('provincia')}`,
      `Estado: ${orNotProvided('estado')}`,
    ].join('\n'),
    type: text(record, 'tipo_organizacion'),
    size: 'NOT_INFORMED',
    sector: text(record, 'sector'),
    sourceData: record,
    createdAt: options.now,
    updatedAt: options.now,
  };
}

/**
 * Newly observed non-empty fields win; the identifier never changes.
 */
export function mergeBorrowerFields(existing: Borrower, observed: NewBorrower, now: Date): BorrowerPatch {
  const pick = (next: string, current: string): string => next || current;
  const sourceData: JsonObject = { ...existing.sourceData, ...observed.sourceData };
  return {
    legalName: pick(observed.legalName, existing.legalName),
    legalIdentifier: pick(observed.legalIdentifier, existing.legalIdentifier),
    email: pick(observed.email, existing.email),
    address: pick(observed.address, existing.address),
    type: pick(observed.type, existing.type),
    sector: pick(observed.sector, existing.sector),
    sourceData,
    updatedAt: now,
  };
}
