import { Application, Award, Borrower, Lender } from '../domain/application/application-types';
import { TemplateVariables } from './notification-sender';

export interface TemplateContext {
  frontendUrl: string;
  application: Application;
  award: Award | null;
  borrower: Borrower | null;
  lender: Lender | null;
  body?: string;
}

export function applicationUrl(frontendUrl: string, uuid: string, path: string = ''): string {
  const base = frontendUrl.replace(/\/+$/, '');
  return `${base}/application/${encodeURIComponent(uuid)}${path}`;
}

export function buildTemplateVariables(context: TemplateContext): TemplateVariables {
  const { application, award, borrower, lender, frontendUrl } = context;
  const variables: TemplateVariables = {
    APPLICATION_URL: applicationUrl(frontendUrl, application.uuid),
    INTRO_URL: applicationUrl(frontendUrl, application.uuid, '/intro'),
    DECLINE_URL: applicationUrl(frontendUrl, application.uuid, '/decline'),
    BORROWER_NAME: borrower?.legalName ?? '',
    BUYER_NAME: award?.buyerName ?? '',
    TENDER_TITLE: award?.title ?? '',
    LENDER_NAME: lender?.name ?? '',
  };
  if (context.body !== undefined) {
    variables.MESSAGE = context.body;
  }
  return variables;
}
