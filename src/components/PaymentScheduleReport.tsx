/**
 * Payment schedule report - printable household or single-payee view
 */

import { renderToStaticMarkup } from 'react-dom/server';
import {
  defaultLocaleConfig,
  formatCurrency,
  formatDateFull,
  formatDateShort,
  formatMonthYear,
  formatPercentage,
  summarizeByPayee,
} from '../modules/calculations';
import { monthOf } from '../modules/dateUtils';
import { getPayeeColors } from '../utils/payeeColors';
import type {
  LocaleConfig,
  MonthlyBillTotal,
  PaymentScheduleItem,
  PaymentScheduleResult,
  WeekendAdjustment,
} from '../types';

export interface PaymentScheduleReportProps {
  result: PaymentScheduleResult;
  locale?: LocaleConfig;
  /** Restrict the report to one payee */
  payeeName?: string;
  showZeroContribution?: boolean;
}

const REPORT_CSS = `
body { font-family: system-ui, sans-serif; color: #1f2937; margin: 0; background: #f9fafb; }
.report { max-width: 1000px; margin: 0 auto; padding: 24px; }
.subtitle { color: #6b7280; margin-bottom: 16px; }
.payment-summary, .month { background: #fff; border: 1px solid #e5e7eb; border-radius: 8px; padding: 16px; margin-bottom: 16px; }
table { width: 100%; border-collapse: collapse; }
th, td { text-align: left; padding: 6px 8px; border-bottom: 1px solid #f3f4f6; }
td.amount { text-align: right; font-variant-numeric: tabular-nums; }
.late { color: #b71c1c; }
.notes { color: #6b7280; font-size: 0.9em; }
`;

const reportTitle = (result: PaymentScheduleResult, payeeName?: string): string =>
  payeeName
    ? `${result.monthsAhead}-Month Payment Schedule for ${payeeName}`
    : `${result.monthsAhead}-Month Cash Flow Projection`;

const sameMonth = (a: { month: number; year: number }, b: { month: number; year: number }): boolean =>
  a.month === b.month && a.year === b.year;

function PayeeSummarySection({
  items,
  colors,
  locale,
}: {
  items: readonly PaymentScheduleItem[];
  colors: Record<string, string>;
  locale: LocaleConfig;
}) {
  const summaries = summarizeByPayee(items);

  return (
    <section className="payment-summary">
      <h3>Payment Planning</h3>
      {summaries.map((summary) => (
        <div className="payee-summary" key={summary.payeeName}>
          <span className="payee-name" style={{ color: colors[summary.payeeName] }}>
            {summary.payeeName}
          </span>
          <span className="amount-range">
            {`${formatCurrency(summary.totalContribution, locale)} over ${summary.itemCount} payment${summary.itemCount === 1 ? '' : 's'}`}
          </span>
        </div>
      ))}
    </section>
  );
}

function MonthSection({
  total,
  items,
  adjustments,
  colors,
  locale,
  showPayee,
}: {
  total: MonthlyBillTotal;
  items: readonly PaymentScheduleItem[];
  adjustments: readonly WeekendAdjustment[];
  colors: Record<string, string>;
  locale: LocaleConfig;
  showPayee: boolean;
}) {
  return (
    <section className="month">
      <h2>{formatMonthYear(total.month, total.year)}</h2>
      <table>
        <thead>
          <tr>
            {showPayee && <th>Payee</th>}
            <th>Income source</th>
            <th>Paid on</th>
            <th>Income</th>
            <th>Contribution</th>
            <th>Share</th>
          </tr>
        </thead>
        <tbody>
          {items.map((item, index) => (
            <tr key={`${item.payeeName}-${item.paymentDate}-${index}`} className={item.isBeforeCutoff ? undefined : 'late'}>
              {showPayee && <td style={{ color: colors[item.payeeName] }}>{item.payeeName}</td>}
              <td>{item.scheduleDescription}</td>
              <td>{formatDateShort(item.paymentDate, locale)}</td>
              <td className="amount">{formatCurrency(item.incomeAmount, locale)}</td>
              <td className="amount">{formatCurrency(item.requiredContribution, locale)}</td>
              <td className="amount">{formatPercentage(item.contributionPercentage)}</td>
            </tr>
          ))}
        </tbody>
      </table>
      <div className="bills">
        <h4>{`Bills due: ${formatCurrency(total.totalBills, locale)}`}</h4>
        <ul>
          {total.billsDue.map((bill, index) => (
            <li key={`${bill.billName}-${index}`}>{`${bill.billName}: ${formatCurrency(bill.amount, locale)}`}</li>
          ))}
        </ul>
      </div>
      {adjustments.length > 0 && (
        <ul className="notes">
          {adjustments.map((adjustment, index) => (
            <li key={`${adjustment.payeeName}-${index}`}>
              {`${adjustment.payeeName} (${adjustment.scheduleDescription}): paid ${formatDateFull(adjustment.adjustedDate, locale)} instead of ${formatDateFull(adjustment.originalDate, locale)}`}
            </li>
          ))}
        </ul>
      )}
    </section>
  );
}

export function PaymentScheduleReport({
  result,
  locale = defaultLocaleConfig(),
  payeeName,
  showZeroContribution = false,
}: PaymentScheduleReportProps) {
  const items = result.scheduleItems.filter(
    (item) => (!payeeName || item.payeeName === payeeName) && (showZeroContribution || item.requiredContribution > 0)
  );
  const colors = getPayeeColors(result.scheduleItems.map((item) => item.payeeName));

  if (!items.length) {
    return (
      <div className="report">
        <div className="no-data">
          <h3>{payeeName ? `No schedule items found for payee '${payeeName}'` : 'No schedule items found'}</h3>
        </div>
      </div>
    );
  }

  return (
    <div className="report">
      <header>
        <h1>{reportTitle(result, payeeName)}</h1>
        <div className="subtitle">{`Starting ${result.startMonth}/${result.startYear}`}</div>
      </header>
      <PayeeSummarySection items={items} colors={colors} locale={locale} />
      {result.monthlyBillTotals.map((total) => {
        const monthItems = items.filter((item) => sameMonth(item.billMonth, total));
        if (!monthItems.length) return null;
        const adjustments = result.weekendAdjustments.filter(
          (adjustment) =>
            (!payeeName || adjustment.payeeName === payeeName) && sameMonth(monthOf(adjustment.originalDate), total)
        );
        return (
          <MonthSection
            key={`${total.year}-${total.month}`}
            total={total}
            items={monthItems}
            adjustments={adjustments}
            colors={colors}
            locale={locale}
            showPayee={!payeeName}
          />
        );
      })}
    </div>
  );
}

/**
 * Render the report as a standalone HTML document.
 */
export function renderPaymentScheduleHtml(
  result: PaymentScheduleResult,
  options: Omit<PaymentScheduleReportProps, 'result'> = {}
): string {
  const markup = renderToStaticMarkup(
    <html lang="en">
      <head>
        <meta charSet="UTF-8" />
        <title>{reportTitle(result, options.payeeName)}</title>
        <style dangerouslySetInnerHTML={{ __html: REPORT_CSS }} />
      </head>
      <body>
        <PaymentScheduleReport result={result} {...options} />
      </body>
    </html>
  );
  return `<!DOCTYPE html>${markup}`;
}
