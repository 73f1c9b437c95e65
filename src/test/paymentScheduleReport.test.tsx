/**
 * Tests for the payment schedule report
 */

import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import { PaymentScheduleReport, renderPaymentScheduleHtml } from '../components/PaymentScheduleReport';
import { calculateProportionalContributions } from '../modules/scheduler';
import { getPayeeColor } from '../utils/payeeColors';
import { makeBill, makePayee, makeSchedule, makeState, monthlyOn } from './fixtures';

const household = makeState(
  [makeBill('Rent', 1200)],
  [
    makePayee('Alice', [makeSchedule(3000, monthlyOn('2024-01-15'), { description: 'Salary' })]),
    makePayee('Bob', [makeSchedule(2000, monthlyOn('2024-01-15'), { description: 'Wages' })]),
  ]
);
const result = calculateProportionalContributions(household, 3, 2024, 1);

describe('PaymentScheduleReport', () => {
  it('should render a standalone household document', () => {
    const html = renderPaymentScheduleHtml(result);

    expect(html.startsWith('<!DOCTYPE html><html lang="en">')).toBe(true);
    expect(html).toContain('<title>1-Month Cash Flow Projection</title>');
    expect(html).toContain('<h1>1-Month Cash Flow Projection</h1>');
    expect(html).toContain('<div class="subtitle">Starting 3/2024</div>');
    expect(html).toContain('<h2>March 2024</h2>');
    expect(html).toContain('<h4>Bills due: $1,200.00</h4>');
    expect(html).toContain('<li>Rent: $1,200.00</li>');
  });

  it('should summarise each payee in their color', () => {
    const html = renderToStaticMarkup(<PaymentScheduleReport result={result} />);

    expect(html).toContain(`<span class="payee-name" style="color:${getPayeeColor(0)}">Alice</span>`);
    expect(html).toContain('<span class="amount-range">$600.00 over 1 payment</span>');
    expect(html).toContain('<td>Salary</td><td>02/15</td><td class="amount">$3,000.00</td><td class="amount">$600.00</td><td class="amount">20.0%</td>');
  });

  it('should narrow the report to one payee', () => {
    const html = renderPaymentScheduleHtml(result, { payeeName: 'Bob' });

    expect(html).toContain('<h1>1-Month Payment Schedule for Bob</h1>');
    expect(html).toContain('<td>Wages</td>');
    expect(html).not.toContain('Alice');
  });

  it('should explain when a payee has nothing to pay', () => {
    const html = renderToStaticMarkup(<PaymentScheduleReport result={result} payeeName="Zed" />);
    expect(html).toContain('<h3>No schedule items found for payee &#x27;Zed&#x27;</h3>');
  });

  it('should note weekend shifts and late payments', () => {
    const shifted = makeState(
      [makeBill('Rent', 1200)],
      [makePayee('Alice', [makeSchedule(2500, monthlyOn('2024-01-30'), { weekendAdjustment: 'next_working_day' })])]
    );
    const html = renderToStaticMarkup(
      <PaymentScheduleReport result={calculateProportionalContributions(shifted, 3, 2024, 1)} />
    );

    expect(html).toContain('<li>Alice (monthly payment): paid 04/01/2024 instead of 03/30/2024</li>');
  });

  it('should hide zero contributions unless asked', () => {
    const salaried = makeState(
      [makeBill('Rent', 1200)],
      [
        makePayee('Alice', [
          makeSchedule(3000, monthlyOn('2024-01-15'), { description: 'Salary', contributionPercentage: 100 }),
          makeSchedule(400, monthlyOn('2024-01-20'), { description: 'Side job' }),
        ]),
      ]
    );
    const zeroResult = calculateProportionalContributions(salaried, 3, 2024, 1);

    expect(zeroResult.scheduleItems.map((item) => item.requiredContribution)).toEqual([1200, 0]);
    expect(renderPaymentScheduleHtml(zeroResult)).not.toContain('<td>Side job</td>');
    expect(renderPaymentScheduleHtml(zeroResult, { showZeroContribution: true })).toContain('<td>Side job</td>');
  });
});
