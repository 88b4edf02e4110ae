import type { AppConfig } from '../config/env';
import type { Integrations } from '../integrations';
import { skipped } from '../integrations/result';
import type { EmailMessage, IntegrationResult } from '../types/domain';

export interface ReportSection {
  title: string;
  value: string | number;
  metric?: string;
  notes?: string;
}

export interface DailyReport {
  headline: string;
  sections: ReportSection[];
}

export interface DailyReportRun {
  status: 'ok';
  report: DailyReport;
  delivery: IntegrationResult;
}

export const REPORT_SUBJECT = 'Daily BFF Report';

// Static until live metrics are aggregated.
export function buildDailyReport(): DailyReport {
  return {
    headline: REPORT_SUBJECT,
    sections: [
      { title: 'Top of Funnel', metric: 'Leads', value: 42 },
      { title: 'Revenue Forecast', value: '$7,500 next 7 days', notes: 'Based on 5% conv.' },
      { title: 'Content Plan', value: '12 posts scheduled (Ocoya)' },
      { title: 'Stock Windows', value: '7:45am, 11:55am, 3:35pm local' }
    ]
  };
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderReportHtml(report: DailyReport): string {
  return `<h2>${escapeHtml(report.headline)}</h2><pre>${escapeHtml(JSON.stringify(report, null, 2))}</pre>`;
}

export async function runDailyReport(settings: AppConfig['report'], integrations: Integrations): Promise<DailyReportRun> {
  const built = buildDailyReport();
  const html = renderReportHtml(built);
  if (!settings.recipient) {
    return { status: 'ok', report: built, delivery: skipped('REPORT_TO', { subject: REPORT_SUBJECT, html }) };
  }
  const message: EmailMessage = { to: settings.recipient, subject: REPORT_SUBJECT, html };
  const delivery = await integrations.sendEmail(message);
  return { status: 'ok', report: built, delivery };
}
