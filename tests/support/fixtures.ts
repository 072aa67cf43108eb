import { EngineConfig, loadConfig } from '../../src/config';
import { createEngine, Engine } from '../../src/container';
import { DAY_MS } from '../../src/domain-types';
import { RawRecord } from '../../src/ingestion/award-source';
import { FakeAwardSource, FakeNotificationSender } from './fakes';
import { InMemoryLifecycleStore } from './in-memory-store';

export const START = new Date('2024-03-01T12:00:00.000Z');

export function testConfig(env: Record<string, string> = {}): EngineConfig {
  return loadConfig({
    HASH_SECRET: 'test-secret',
    QUIET: 'true',
    FRONTEND_URL: 'https://credit.example.org',
    ADMIN_EMAIL_GROUP: 'admin@example.org',
    PROGRESS_TO_REMIND_STARTED_APPLICATIONS: '0.8',
    NOTIFICATION_TIMEOUT_MS: '50',
    HTTP_BASE_DELAY_MS: '10',
    AWARD_SOURCE_PAGE_SIZE: '2',
    ...env,
  });
}

export interface TestClock {
  (): Date;
  set(date: Date): void;
  advanceDays(days: number): void;
}

export function createTestClock(start: Date = START): TestClock {
  let current = new Date(start.getTime());
  const clock = () => new Date(current.getTime());
  return Object.assign(clock, {
    set(date: Date) {
      current = new Date(date.getTime());
    },
    advanceDays(days: number) {
      current = new Date(current.getTime() + days * DAY_MS);
    },
  });
}

export interface TestEngine {
  engine: Engine;
  store: InMemoryLifecycleStore;
  source: FakeAwardSource;
  sender: FakeNotificationSender;
  clock: TestClock;
}

export function createTestEngine(env: Record<string, string> = {}): TestEngine {
  const store = new InMemoryLifecycleStore();
  const source = new FakeAwardSource();
  const sender = new FakeNotificationSender();
  const clock = createTestClock();
  const engine = createEngine(testConfig(env), { store, source, sender, clock });
  return { engine, store, source, sender, clock };
}

// === Upstream records ===

export function awardRecord(overrides: RawRecord = {}): RawRecord {
  return {
    id_del_portafolio: 'CO1.BDOS.1001',
    nit_del_proveedor_adjudicado: '900111222',
    entidad: 'Alcaldia de Prueba',
    nombre_del_procedimiento: 'Suministro de papeleria',
    descripci_n_del_procedimiento: 'Papeleria para oficinas',
    valor_total_adjudicacion: '12500000',
    tipo_de_contrato: 'Suministro',
    modalidad_de_contratacion: 'Minima cuantia',
    fecha_adjudicacion: '2024-02-20T00:00:00.000',
    fecha_de_ultima_publicaci: '2024-02-25T00:00:00.000',
    urlproceso: { url: 'https://procurement.example.org/process/1001' },
    ...overrides,
  };
}

export function borrowerRecord(supplierId: string, overrides: RawRecord = {}): RawRecord {
  return {
    nit_entidad: supplierId,
    nombre_entidad: 'Papeleria Ejemplo SAS',
    direccion: 'Calle 10 # 20-30',
    ciudad: 'Bogota',
    provincia: 'Cundinamarca',
    estado: 'Activo',
    tipo_organizacion: 'Sociedad',
    sector: 'Comercio',
    es_pyme: 'SI',
    ...overrides,
  };
}

export function emailRecord(supplierId: string, email: string = 'contacto@papeleria.example.org'): RawRecord {
  return { nit: supplierId, correo_entidad: email };
}

/**
 * Registers borrower and email records so the supplier can be ingested.
 */
export function registerSupplier(source: FakeAwardSource, supplierId: string, email?: string): void {
  source.borrowers.set(supplierId, [borrowerRecord(supplierId)]);
  source.emails.set(supplierId, [emailRecord(supplierId, email)]);
}

/**
 * Retries the assertion across event-loop turns until it passes, for effects
 * the engine runs after commit without awaiting them.
 */
export async function eventually(assertion: () => void, attempts: number = 100): Promise<void> {
  for (let attempt = 1; ; attempt += 1) {
    try {
      assertion();
      return;
    } catch (error) {
      if (attempt >= attempts) {
        throw error;
      }
      await new Promise(resolve => setImmediate(resolve));
    }
  }
}
