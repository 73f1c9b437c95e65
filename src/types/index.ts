/**
 * Core type definitions for the household bill splitter
 */

/** YYYY-MM-DD formatted date string */
export type YMDString = string;

/** Recurrence flavour: fixed elapsed time or same day-of-month each period */
export type RecurrenceKind = "interval" | "calendar";

/** Recurrence unit; its meaning depends on the recurrence kind */
export type RecurrenceUnit = "daily" | "weekly" | "monthly" | "quarterly" | "yearly";

/** How a payment date landing on a weekend is moved */
export type WeekendAdjustmentStrategy = "last_working_day" | "next_working_day";

/** Position of the currency symbol relative to the amount */
export type CurrencyPosition = "before" | "after";

/** Supported date display formats */
export type DateFormat = "dd/mm/yyyy" | "mm/dd/yyyy";

/**
 * Periodic occurrence rule
 */
export interface Recurrence {
  kind: RecurrenceKind;
  interval: RecurrenceUnit;
  /** Every N units; defaults to 1 */
  every?: number;
  start: YMDString;
  end?: YMDString | null;
}

/**
 * One entry of a bill's price history
 */
export interface BillPriceEntry {
  amount: number;
  recurrence: Recurrence;
  /** First date on which this entry is authoritative */
  startDate: YMDString;
}

/**
 * Per-bill cost sharing rules
 */
export interface BillShare {
  /** Payees never charged for this bill */
  exclude: string[];
  /** Payee name -> fixed percentage for this bill only */
  custom: Record<string, number>;
}

/**
 * Recurring household expense
 */
export interface Bill {
  name: string;
  description?: string;
  /** Sorted by startDate ascending */
  priceHistory: BillPriceEntry[];
  share: BillShare;
}

/**
 * Income stream of a payee
 */
export interface PaySchedule {
  amount: number;
  recurrence: Recurrence;
  description?: string;
  weekendAdjustment: WeekendAdjustmentStrategy;
  /** Share of the payee's responsibility this stream must fund, in percent */
  contributionPercentage?: number | null;
  /** Amount was missing on input and holds the nominal placeholder */
  usesPlaceholderAmount?: boolean;
}

/**
 * Income earner responsible for part of the household bills
 */
export interface Payee {
  name: string;
  description?: string;
  /** Payee takes part in bill months starting with the month of this date */
  startDate?: YMDString | null;
  /** Payee-level default share of each bill, in percent */
  defaultSharePercentage?: number | null;
  paySchedules: PaySchedule[];
}

/**
 * Scheduling configuration
 */
export interface ScheduleOptions {
  /** 1-31, clamped to the last day of shorter months */
  cutoffDay: number;
  weekendAdjustment: WeekendAdjustmentStrategy;
  defaultProjectionMonths: number;
}

/**
 * Immutable snapshot consumed by the scheduler
 */
export interface HouseholdState {
  bills: Bill[];
  payees: Payee[];
  scheduleOptions: ScheduleOptions;
}

/**
 * Month of a given year (month is 1-based)
 */
export interface MonthRef {
  month: number;
  year: number;
}

/**
 * One contribution an income event must make towards a bill month
 */
export interface PaymentScheduleItem {
  readonly payeeName: string;
  readonly scheduleDescription: string;
  readonly incomeAmount: number;
  readonly requiredContribution: number;
  /** requiredContribution / incomeAmount * 100 */
  readonly contributionPercentage: number;
  readonly paymentDate: YMDString;
  readonly isBeforeCutoff: boolean;
  /** Bill month this contribution funds */
  readonly billMonth: MonthRef;
}

/**
 * Bill due inside a month
 */
export interface BillDue {
  readonly billName: string;
  readonly amount: number;
}

/**
 * Bills due in a calendar month
 */
export interface MonthlyBillTotal {
  readonly month: number;
  readonly year: number;
  readonly totalBills: number;
  readonly billsDue: readonly BillDue[];
}

/**
 * Payment moved across a month boundary by weekend adjustment
 */
export interface WeekendAdjustment {
  readonly payeeName: string;
  readonly scheduleDescription: string;
  readonly originalDate: YMDString;
  readonly adjustedDate: YMDString;
  readonly incomeAmount: number;
}

/**
 * Full scheduling output
 */
export interface PaymentScheduleResult {
  readonly scheduleItems: readonly PaymentScheduleItem[];
  readonly monthlyBillTotals: readonly MonthlyBillTotal[];
  readonly weekendAdjustments: readonly WeekendAdjustment[];
  readonly startMonth: number;
  readonly startYear: number;
  readonly monthsAhead: number;
}

/**
 * Income event found inside a window
 */
export interface IncomeEvent {
  schedule: PaySchedule;
  /** Occurrence date before weekend adjustment */
  naturalDate: YMDString;
  /** Date the money actually arrives */
  paymentDate: YMDString;
}

/**
 * Payment whose natural date sits in a month but was shifted out of it
 */
export interface ShiftedPayment {
  schedule: PaySchedule;
  originalDate: YMDString;
  adjustedDate: YMDString;
}

/**
 * Options accepted by the scheduler
 */
export interface SchedulerOptions {
  /** Bill months before this month total zero */
  projectionStart?: MonthRef | null;
}

/**
 * Outcome of a share validation
 */
export interface ShareValidation {
  valid: boolean;
  message: string;
}

/**
 * Locale used by presentation code
 */
export interface LocaleConfig {
  currencySymbol: string;
  currencyPosition: CurrencyPosition;
  thousandsSeparator: string;
  decimalSeparator: string;
  dateFormat: DateFormat;
}

/**
 * Normalization options
 */
export interface NormalizeOptions {
  strict?: boolean;
}

/**
 * Synchronous key/value persistence backend
 */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

/**
 * Per-payee totals over a schedule result
 */
export interface PayeeSummary {
  payeeName: string;
  totalContribution: number;
  totalIncome: number;
  itemCount: number;
}
