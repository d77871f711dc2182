/**
 * Grooming report message builders.
 * Produce a subject plus email and SMS bodies for one SNS publish.
 * Plain text only; SNS fans the right body out per protocol.
 */
import type { LocalDate, Resort } from '../../types/grooming';

export interface GroomingMessage {
  subject: string;
  email: string;
  sms: string;
}

export interface NotableRunsMessageArgs {
  resort: Resort;
  date: LocalDate;
  runNames: string[];
  reportSiteUrl: string;
}

/**
 * Link to the resort's own full report
 */
export function resortReportLink(resort: Resort): string {
  return resort.displayUrl ? resort.displayUrl : resort.reportUrl;
}

const subjectFor = (resort: Resort, date: LocalDate) => `${date} ${resort.name} Blue Moon Grooming Report`;

export function buildNotableRunsMessage(args: NotableRunsMessageArgs): GroomingMessage {
  const { resort, date, runNames, reportSiteUrl } = args;
  const bullets = runNames.map((name) => `  * ${name}`).join('\n');
  const fullReport = resortReportLink(resort);

  const sms = [
    date,
    bullets,
    '',
    `Other resort reports: ${reportSiteUrl}`,
    `Full report: ${fullReport}`,
  ].join('\n');

  const email = [
    'Good morning!',
    '',
    `Today's Blue Moon Grooming Report for ${resort.name} contains:`,
    bullets,
    '',
    `Reports for other resorts and continually updated report for ${resort.name}: ${reportSiteUrl}`,
    `Full report: ${fullReport}`,
  ].join('\n');

  return { subject: subjectFor(resort, date), email, sms };
}

export function buildNoRunsMessage(args: Omit<NotableRunsMessageArgs, 'runNames'>): GroomingMessage {
  const { resort, date, reportSiteUrl } = args;
  const fullReport = resortReportLink(resort);

  const sms = [
    date,
    '',
    'There are no blue moon runs today.',
    '',
    `Other resort reports: ${reportSiteUrl}`,
    `Full report: ${fullReport}`,
  ].join('\n');

  const email = [
    'Good morning!',
    '',
    `${resort.name} has no blue moon runs on today's report.`,
    `Reports for other resorts and continually updated report for ${resort.name}: ${reportSiteUrl}`,
    `Full report: ${fullReport}`,
  ].join('\n');

  return { subject: subjectFor(resort, date), email, sms };
}

export function buildAlertMessage(resort: Resort, date: LocalDate): { subject: string; message: string } {
  return {
    subject: `BMGRM ${resort.name} Alert`,
    message: `No notification sent for notable report on ${date} at ${resort.name}`,
  };
}
