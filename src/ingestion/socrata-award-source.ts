import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { EngineConfig } from '../config';
import { SourceFormatError, UpstreamHttpError } from '../errors';
import { AwardPageQuery, AwardSource, RawRecord } from './award-source';

export const DATASETS = {
  AWARDS: 'p6dx-8zbt',
  CONTRACTS: 'jbjy-vk9h',
  BORROWER: '4ex9-j3n8',
  BORROWER_EMAIL: 'vzyx-b5wf',
} as const;

const recordsSchema = z.array(z.record(z.unknown()));

type SocrataParams = Record<string, string | number>;

/**
 * Socrata timestamps are floating (no zone); the engine treats them as UTC.
 */
export function formatSourceDate(date: Date): string {
  return `${date.toISOString().slice(0, 10)}T00:00:00.000`;
}

export function quoteSoql(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function toUpstreamError(error: unknown, url: string): UpstreamHttpError {
  if (error instanceof UpstreamHttpError) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? null;
    // No response means a network failure or timeout
    const retryable = status === null || status >= 500;
    return new UpstreamHttpError(`Upstream request failed: ${error.message}`, status, retryable, { url });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamHttpError(`Upstream request failed: ${message}`, null, true, { url });
}

export class SocrataAwardSource implements AwardSource {
  private http: AxiosInstance;

  constructor(config: EngineConfig['awardSource'], http?: AxiosInstance) {
    this.http =
      http ??
      axios.create({
        baseURL: config.baseUrl,
        timeout: config.http.timeoutMs,
        headers: config.appToken ? { 'X-App-Token': config.appToken } : {},
      });
  }

  private async get(dataset: string, params: SocrataParams): Promise<RawRecord[]> {
    const url = `/resource/${dataset}.json`;
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, { params });
      data = response.data;
    } catch (error) {
      throw toUpstreamError(error, url);
    }
    const parsed = recordsSchema.safeParse(data);
    if (!parsed.success) {
      throw new SourceFormatError('Upstream response is not a list of records', { url, params });
    }
    return parsed.data;
  }

  async fetchAwardsPage(query: AwardPageQuery): Promise<RawRecord[]> {
    const conditions = [`fecha_de_ultima_publicaci >= ${quoteSoql(formatSourceDate(query.fromDate))}`];
    if (query.untilDate) {
      conditions.push(`fecha_de_ultima_publicaci <= ${quoteSoql(formatSourceDate(query.untilDate))}`);
    }
    conditions.push(`adjudicado = 'Si'`);
    return this.get(DATASETS.AWARDS, {
      $limit: query.limit,
      $offset: query.offset,
      $order: 'fecha_de_ultima_publicaci desc null last',
      $where: conditions.join(' AND '),
    });
  }

  async fetchAwardByIdAndSupplier(awardId: string, supplierId: string): Promise<RawRecord[]> {
    return this.get(DATASETS.AWARDS, {
      $where: `id_del_portafolio = ${quoteSoql(awardId)} AND nit_del_proveedor_adjudicado = ${quoteSoql(supplierId)}`,
    });
  }

  async fetchBorrower(supplierId: string): Promise<RawRecord[]> {
    return this.get(DATASETS.BORROWER, {
      $where: `nit_entidad = ${quoteSoql(supplierId)} AND es_pyme = 'SI'`,
    });
  }

  async fetchBorrowerEmails(supplierId: string): Promise<RawRecord[]> {
    return this.get(DATASETS.BORROWER_EMAIL, {
      $where: `nit = ${quoteSoql(supplierId)}`,
    });
  }

  async fetchPreviousContracts(supplierId: string): Promise<RawRecord[]> {
    return this.get(DATASETS.CONTRACTS, {
      $where: `documento_proveedor = ${quoteSoql(supplierId)} AND fecha_de_firma IS NOT NULL`,
    });
  }
}
