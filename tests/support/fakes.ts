import { MessageType } from '../../src/domain/application/application-types';
import { AwardPageQuery, AwardSource, RawRecord } from '../../src/ingestion/award-source';
import { NotificationRecipient, NotificationSender, TemplateVariables } from '../../src/notifications/notification-sender';

type SourceMethod = keyof AwardSource;

/**
 * Award source serving canned records. Failures queued with `failNext` are
 * thrown, in order, by the next calls of that method.
 */
export class FakeAwardSource implements AwardSource {
  // Served in offset/limit slices, like the upstream paging
  awards: RawRecord[] = [];
  borrowers = new Map<string, RawRecord[]>();
  emails = new Map<string, RawRecord[]>();
  contracts = new Map<string, RawRecord[]>();
  awardsById: RawRecord[] = [];
  pageQueries: AwardPageQuery[] = [];
  calls: { method: SourceMethod; arg: string }[] = [];
  private failures = new Map<SourceMethod, Error[]>();

  failNext(method: SourceMethod, ...errors: Error[]): void {
    this.failures.set(method, [...(this.failures.get(method) ?? []), ...errors]);
  }

  private record(method: SourceMethod, arg: string): void {
    this.calls.push({ method, arg });
    const queued = this.failures.get(method);
    const failure = queued?.shift();
    if (failure) {
      throw failure;
    }
  }

  callsOf(method: SourceMethod): number {
    return this.calls.filter(call => call.method === method).length;
  }

  async fetchAwardsPage(query: AwardPageQuery): Promise<RawRecord[]> {
    this.record('fetchAwardsPage', String(query.offset));
    this.pageQueries.push(query);
    return this.awards.slice(query.offset, query.offset + query.limit);
  }

  async fetchAwardByIdAndSupplier(awardId: string, supplierId: string): Promise<RawRecord[]> {
    this.record('fetchAwardByIdAndSupplier', `${awardId}/${supplierId}`);
    return this.awardsById.filter(
      record => record.id_del_portafolio === awardId && record.nit_del_proveedor_adjudicado === supplierId
    );
  }

  async fetchBorrower(supplierId: string): Promise<RawRecord[]> {
    this.record('fetchBorrower', supplierId);
    return this.borrowers.get(supplierId) ?? [];
  }

  async fetchBorrowerEmails(supplierId: string): Promise<RawRecord[]> {
    this.record('fetchBorrowerEmails', supplierId);
    return this.emails.get(supplierId) ?? [];
  }

  async fetchPreviousContracts(supplierId: string): Promise<RawRecord[]> {
    this.record('fetchPreviousContracts', supplierId);
    return this.contracts.get(supplierId) ?? [];
  }
}

export interface SentNotification {
  templateKind: MessageType;
  recipient: NotificationRecipient;
  variables: TemplateVariables;
}

/**
 * Records every send. `failOn` makes sends of that template reject;
 * `hangOn` makes them never settle.
 */
export class FakeNotificationSender implements NotificationSender {
  sent: SentNotification[] = [];
  failOn: MessageType | null = null;
  hangOn: MessageType | null = null;
  private counter = 0;

  async send(templateKind: MessageType, recipient: NotificationRecipient, variables: TemplateVariables): Promise<string> {
    if (this.failOn === templateKind) {
      throw new Error('relay unavailable');
    }
    if (this.hangOn === templateKind) {
      return new Promise<string>(() => undefined);
    }
    this.sent.push({ templateKind, recipient, variables });
    this.counter += 1;
    return `test-message-${this.counter}`;
  }

  kinds(): MessageType[] {
    return this.sent.map(notification => notification.templateKind);
  }
}
