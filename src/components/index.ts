/**
 * Component exports
 */

export { PaymentScheduleReport, renderPaymentScheduleHtml } from './PaymentScheduleReport';
export type { PaymentScheduleReportProps } from './PaymentScheduleReport';
