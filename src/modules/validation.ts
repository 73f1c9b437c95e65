"use strict";

import { compareYMD, fromYMD, toYMD } from "./dateUtils";
import { validateBillShares } from "./bills";
import { defaultScheduleOptions } from "./scheduleOptions";
import type {
  Bill,
  BillPriceEntry,
  BillShare,
  HouseholdState,
  NormalizeOptions,
  Payee,
  PaySchedule,
  Recurrence,
  RecurrenceKind,
  RecurrenceUnit,
  ScheduleOptions,
  WeekendAdjustmentStrategy,
  YMDString,
} from "../types";

/** Nominal income used when a pay schedule has no amount */
export const PLACEHOLDER_INCOME_AMOUNT = 1000;

/** Start date given to legacy bills whose recurrence has none */
const LEGACY_BILL_START: YMDString = "2024-01-01";

const RECURRENCE_KINDS: RecurrenceKind[] = ["interval", "calendar"];
const RECURRENCE_UNITS: RecurrenceUnit[] = ["daily", "weekly", "monthly", "quarterly", "yearly"];
const WEEKEND_STRATEGIES: WeekendAdjustmentStrategy[] = ["last_working_day", "next_working_day"];

type RawRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Read a field that may be spelled in snake_case or camelCase.
 */
const pick = (raw: RawRecord, snake: string, camel: string): unknown =>
  raw[snake] !== undefined ? raw[snake] : raw[camel];

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === "number" && Number.isFinite(value);

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() ? value.trim() : undefined;

const isRecurrenceKind = (value: unknown): value is RecurrenceKind =>
  typeof value === "string" && (RECURRENCE_KINDS as string[]).includes(value);

const isRecurrenceUnit = (value: unknown): value is RecurrenceUnit =>
  typeof value === "string" && (RECURRENCE_UNITS as string[]).includes(value);

const isWeekendStrategy = (value: unknown): value is WeekendAdjustmentStrategy =>
  typeof value === "string" && (WEEKEND_STRATEGIES as string[]).includes(value);

/**
 * Clamp a numeric value between inclusive bounds.
 */
export const clamp = (value: number, min: number, max: number): number =>
  Math.max(min, Math.min(max, value));

/**
 * Check that a value is a real calendar date in YYYY-MM-DD form.
 */
export const isValidYMDString = (value: unknown): value is YMDString => {
  if (typeof value !== "string" || !/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  return toYMD(fromYMD(value)) === value;
};

/**
 * Validate and parse an amount.
 */
export const validateAmount = (value: string | number): number => {
  const amount = typeof value === "number" ? value : Number(String(value).trim());
  if (String(value).trim() === "" || !Number.isFinite(amount)) {
    throw new Error(`Invalid amount format: ${value}`);
  }
  if (amount < 0) throw new Error("Amount cannot be negative");
  return amount;
};

const validateIntegerInRange = (value: string | number, min: number, max: number, label: string, rangeMessage: string): number => {
  const num = typeof value === "number" ? value : Number(String(value).trim());
  if (String(value).trim() === "" || !Number.isInteger(num)) {
    throw new Error(`Invalid ${label} format: ${value}`);
  }
  if (num < min || num > max) throw new Error(rangeMessage);
  return num;
};

/**
 * Validate that a month lies between 1 and 12.
 */
export const validateMonth = (value: string | number): number =>
  validateIntegerInRange(value, 1, 12, "month", "Month must be between 1 and 12");

/**
 * Validate that a year lies between 2020 and 2100.
 */
export const validateYear = (value: string | number): number =>
  validateIntegerInRange(value, 2020, 2100, "year", "Year must be between 2020 and 2100");

/**
 * Validate that a projection length lies between 1 and 60 months.
 */
export const validateProjectionMonths = (value: string | number): number =>
  validateIntegerInRange(value, 1, 60, "months", "Projection months must be between 1 and 60");

/**
 * Validate that a cutoff day lies between 1 and 31.
 */
export const validateCutoffDay = (value: string | number): number =>
  validateIntegerInRange(value, 1, 31, "day", "Cutoff day must be between 1 and 31");

/**
 * Validate an optional YYYY-MM-DD string.
 * @returns The date, or null for blank input.
 */
export const validateDateString = (value: string | null | undefined): YMDString | null => {
  if (value === null || value === undefined || value.trim() === "") return null;
  const trimmed = value.trim();
  if (!isValidYMDString(trimmed)) {
    throw new Error(`Invalid date format. Use YYYY-MM-DD: ${value}`);
  }
  return trimmed;
};

/**
 * Normalize persisted scheduling options.
 */
export const sanitizeScheduleOptions = (raw: unknown): ScheduleOptions => {
  const defaults = defaultScheduleOptions();
  if (!isRecord(raw)) return defaults;

  const cutoffDay = pick(raw, "cutoff_day", "cutoffDay");
  const weekendAdjustment = pick(raw, "weekend_adjustment", "weekendAdjustment");
  const projectionMonths = pick(raw, "default_projection_months", "defaultProjectionMonths");

  return {
    cutoffDay: isFiniteNumber(cutoffDay) ? clamp(Math.trunc(cutoffDay), 1, 31) : defaults.cutoffDay,
    weekendAdjustment: isWeekendStrategy(weekendAdjustment) ? weekendAdjustment : defaults.weekendAdjustment,
    defaultProjectionMonths: isFiniteNumber(projectionMonths)
      ? clamp(Math.trunc(projectionMonths), 1, 60)
      : defaults.defaultProjectionMonths,
  };
};

/**
 * Normalize a recurrence record.
 */
export const normalizeRecurrence = (raw: unknown, { strict = false }: NormalizeOptions = {}): Recurrence | null => {
  if (!isRecord(raw)) {
    if (strict) throw new Error("Invalid recurrence record");
    return null;
  }

  const kind = raw.kind;
  if (!isRecurrenceKind(kind)) {
    if (strict) throw new Error(`Invalid recurrence kind: ${String(kind)}`);
    return null;
  }

  let interval: RecurrenceUnit;
  if (isRecurrenceUnit(raw.interval)) {
    interval = raw.interval;
  } else if (kind === "calendar") {
    interval = "monthly";
  } else {
    if (strict) throw new Error(`Invalid recurrence interval: ${String(raw.interval)}`);
    return null;
  }

  if (!isValidYMDString(raw.start)) {
    if (strict) throw new Error("Invalid recurrence start date");
    return null;
  }

  const recurrence: Recurrence = {
    kind,
    interval,
    every: isFiniteNumber(raw.every) ? Math.trunc(raw.every) : 1,
    start: raw.start,
  };

  if (isValidYMDString(raw.end)) {
    recurrence.end = raw.end;
  } else if (raw.end !== undefined && raw.end !== null && strict) {
    throw new Error("Invalid recurrence end date");
  }

  return recurrence;
};

/**
 * Normalize bill sharing from either the map form ({ exclude, custom }) or the
 * legacy list form ([{ payee, percentage }]).
 */
export const normalizeBillShare = (raw: unknown): BillShare => {
  const share: BillShare = { exclude: [], custom: {} };

  if (Array.isArray(raw)) {
    for (const item of raw) {
      if (isRecord(item) && typeof item.payee === "string" && isFiniteNumber(item.percentage)) {
        share.custom[item.payee] = item.percentage;
      }
    }
    return share;
  }

  if (!isRecord(raw)) return share;

  if (Array.isArray(raw.exclude)) {
    share.exclude = raw.exclude.filter((name): name is string => typeof name === "string");
  }
  if (isRecord(raw.custom)) {
    for (const [name, percentage] of Object.entries(raw.custom)) {
      if (isFiniteNumber(percentage)) share.custom[name] = percentage;
    }
  }
  return share;
};

const normalizePriceEntry = (raw: unknown, strict: boolean): BillPriceEntry | null => {
  if (!isRecord(raw)) {
    if (strict) throw new Error("Invalid price history entry");
    return null;
  }
  const recurrence = normalizeRecurrence(raw.recurrence, { strict });
  if (!recurrence) return null;

  if (!isFiniteNumber(raw.amount) || raw.amount < 0) {
    if (strict) throw new Error("Invalid price history amount");
    return null;
  }

  const startDate = pick(raw, "start_date", "startDate");
  return {
    amount: raw.amount,
    recurrence,
    startDate: isValidYMDString(startDate) ? startDate : recurrence.start,
  };
};

/**
 * Normalize a bill, converting the legacy amount/recurrence form into a
 * one-entry price history.
 */
export const normalizeBill = (raw: unknown, { strict = false }: NormalizeOptions = {}): Bill | null => {
  if (!isRecord(raw) || typeof raw.name !== "string" || !raw.name.trim()) {
    if (strict) throw new Error("Invalid bill record");
    return null;
  }

  const priceHistory: BillPriceEntry[] = [];
  const rawHistory = pick(raw, "price_history", "priceHistory");

  if (Array.isArray(rawHistory)) {
    for (const item of rawHistory) {
      const entry = normalizePriceEntry(item, strict);
      if (entry) priceHistory.push(entry);
    }
  } else if (raw.amount !== undefined || raw.recurrence !== undefined) {
    const recurrence = normalizeRecurrence(raw.recurrence, { strict });
    if (recurrence && isFiniteNumber(raw.amount) && raw.amount >= 0) {
      priceHistory.push({ amount: raw.amount, recurrence, startDate: recurrence.start || LEGACY_BILL_START });
    } else if (strict) {
      throw new Error(`Invalid amount or recurrence for bill '${raw.name}'`);
    }
  }

  priceHistory.sort((a, b) => compareYMD(a.startDate, b.startDate));

  const bill: Bill = {
    name: raw.name.trim(),
    priceHistory,
    share: normalizeBillShare(raw.share),
  };
  const description = optionalString(raw.description);
  if (description) bill.description = description;
  return bill;
};

/**
 * Normalize a pay schedule. A missing amount becomes the nominal placeholder.
 */
export const normalizePaySchedule = (raw: unknown, { strict = false }: NormalizeOptions = {}): PaySchedule | null => {
  if (!isRecord(raw)) {
    if (strict) throw new Error("Invalid pay schedule record");
    return null;
  }

  const recurrence = normalizeRecurrence(raw.recurrence, { strict });
  if (!recurrence) return null;

  const weekendAdjustment = pick(raw, "weekend_adjustment", "weekendAdjustment");
  const contributionPercentage = pick(raw, "contribution_percentage", "contributionPercentage");
  const hasAmount = isFiniteNumber(raw.amount) && raw.amount > 0;

  if (raw.amount !== undefined && raw.amount !== null && !hasAmount && strict) {
    throw new Error("Invalid pay schedule amount");
  }

  const schedule: PaySchedule = {
    amount: hasAmount && isFiniteNumber(raw.amount) ? raw.amount : PLACEHOLDER_INCOME_AMOUNT,
    recurrence,
    weekendAdjustment: isWeekendStrategy(weekendAdjustment) ? weekendAdjustment : "last_working_day",
    contributionPercentage: isFiniteNumber(contributionPercentage) ? contributionPercentage : null,
  };
  const description = optionalString(raw.description);
  if (description) schedule.description = description;
  if (!hasAmount) schedule.usesPlaceholderAmount = true;
  return schedule;
};

/**
 * Normalize a payee and its pay schedules.
 */
export const normalizePayee = (raw: unknown, { strict = false }: NormalizeOptions = {}): Payee | null => {
  if (!isRecord(raw) || typeof raw.name !== "string" || !raw.name.trim()) {
    if (strict) throw new Error("Invalid payee record");
    return null;
  }

  const rawSchedules = pick(raw, "pay_schedules", "paySchedules");
  if (rawSchedules !== undefined && !Array.isArray(rawSchedules) && strict) {
    throw new Error(`Invalid pay schedules for payee '${raw.name}'`);
  }

  const paySchedules: PaySchedule[] = [];
  if (Array.isArray(rawSchedules)) {
    for (const item of rawSchedules) {
      const schedule = normalizePaySchedule(item, { strict });
      if (schedule) paySchedules.push(schedule);
    }
  }

  const startDate = pick(raw, "start_date", "startDate");
  const defaultShare = pick(raw, "default_share_percentage", "defaultSharePercentage");
  if (startDate !== undefined && startDate !== null && !isValidYMDString(startDate) && strict) {
    throw new Error(`Invalid start date for payee '${raw.name}'`);
  }

  const payee: Payee = {
    name: raw.name.trim(),
    startDate: isValidYMDString(startDate) ? startDate : null,
    defaultSharePercentage: isFiniteNumber(defaultShare) ? defaultShare : null,
    paySchedules,
  };
  const description = optionalString(raw.description);
  if (description) payee.description = description;
  return payee;
};

/**
 * Produce an empty household.
 */
export const defaultState = (): HouseholdState => ({
  bills: [],
  payees: [],
  scheduleOptions: defaultScheduleOptions(),
});

/**
 * Normalize a persisted state payload into the in-memory model.
 * @param options.strict - Throw on malformed records instead of dropping them.
 */
export const normalizeState = (raw: unknown, { strict = false }: NormalizeOptions = {}): HouseholdState => {
  if (!isRecord(raw)) {
    if (strict) throw new Error("Invalid state payload");
    return defaultState();
  }

  const collect = <T>(key: string, normalize: (item: unknown, options: NormalizeOptions) => T | null): T[] => {
    const list = raw[key];
    if (list === undefined || list === null) return [];
    if (!Array.isArray(list)) {
      if (strict) throw new Error(`Invalid ${key}; expected an array`);
      return [];
    }
    const items: T[] = [];
    for (const item of list) {
      const normalized = normalize(item, { strict });
      if (normalized) items.push(normalized);
    }
    return items;
  };

  return {
    bills: collect("bills", normalizeBill),
    payees: collect("payees", normalizePayee),
    scheduleOptions: sanitizeScheduleOptions(pick(raw, "schedule_options", "scheduleOptions")),
  };
};

const serializeRecurrence = (recurrence: Recurrence): RawRecord => ({
  kind: recurrence.kind,
  interval: recurrence.interval,
  every: recurrence.every ?? 1,
  start: recurrence.start,
  end: recurrence.end ?? null,
});

/**
 * Convert the in-memory model into its persisted (snake_case) form.
 */
export const serializeState = (state: HouseholdState): RawRecord => ({
  bills: state.bills.map((bill) => ({
    name: bill.name,
    description: bill.description ?? null,
    price_history: bill.priceHistory.map((entry) => ({
      amount: entry.amount,
      recurrence: serializeRecurrence(entry.recurrence),
      start_date: entry.startDate,
    })),
    share: { exclude: [...bill.share.exclude], custom: { ...bill.share.custom } },
  })),
  payees: state.payees.map((payee) => ({
    name: payee.name,
    description: payee.description ?? null,
    start_date: payee.startDate ?? null,
    default_share_percentage: payee.defaultSharePercentage ?? null,
    pay_schedules: payee.paySchedules.map((schedule) => ({
      amount: schedule.usesPlaceholderAmount ? null : schedule.amount,
      recurrence: serializeRecurrence(schedule.recurrence),
      description: schedule.description ?? null,
      weekend_adjustment: schedule.weekendAdjustment,
      contribution_percentage: schedule.contributionPercentage ?? null,
    })),
  })),
  schedule_options: {
    cutoff_day: state.scheduleOptions.cutoffDay,
    weekend_adjustment: state.scheduleOptions.weekendAdjustment,
    default_projection_months: state.scheduleOptions.defaultProjectionMonths,
  },
});

/**
 * Problems with a recurrence record, phrased for the owner named in `prefix`.
 */
const recurrenceErrors = (raw: unknown, prefix: string): string[] => {
  if (!isRecord(raw)) return [`${prefix}: 'recurrence' should be a dictionary`];
  const errors: string[] = [];
  if (!raw.kind) errors.push(`${prefix}: Missing 'kind' in recurrence`);
  if (!raw.start) errors.push(`${prefix}: Missing 'start' date in recurrence`);
  else if (!isValidYMDString(raw.start)) errors.push(`${prefix}: Invalid 'start' date in recurrence: ${String(raw.start)}`);
  if (raw.kind === "calendar" && !raw.interval) {
    errors.push(`${prefix}: Calendar recurrence missing 'interval' (monthly, quarterly, yearly)`);
  } else if (raw.kind === "interval" && !raw.interval) {
    errors.push(`${prefix}: Interval recurrence missing 'interval' (daily, weekly, monthly, etc.)`);
  }
  if (raw.every !== undefined && raw.every !== null && !(isFiniteNumber(raw.every) && raw.every >= 1)) {
    errors.push(`${prefix}: 'every' must be a positive whole number`);
  }
  return errors;
};

const billStructureErrors = (bill: RawRecord, billName: string): string[] => {
  const errors: string[] = [];
  const history = pick(bill, "price_history", "priceHistory");
  const hasLegacyFormat = "amount" in bill && "recurrence" in bill;
  const hasHistoryFormat = Array.isArray(history) && history.length > 0;

  if (hasHistoryFormat) {
    history.forEach((entry, index) => {
      if (!isRecord(entry)) return;
      const prefix = `Bill '${billName}' price_history[${index}]`;
      if (entry.amount === undefined || entry.amount === null) errors.push(`${prefix}: Missing 'amount' field`);
      if (!entry.recurrence) {
        errors.push(`${prefix}: Missing 'recurrence' field`);
      } else {
        errors.push(...recurrenceErrors(entry.recurrence, prefix));
      }
      const hasStart = pick(entry, "start_date", "startDate") != null;
      const hasRecurrenceStart = isRecord(entry.recurrence) && entry.recurrence.start != null;
      if (!hasStart && !hasRecurrenceStart) {
        errors.push(`${prefix}: Missing 'start_date' field (or 'start' in recurrence)`);
      }
    });
  } else if (hasLegacyFormat) {
    if (bill.recurrence !== null) errors.push(...recurrenceErrors(bill.recurrence, `Bill '${billName}'`));
  } else {
    if (bill.amount === undefined || bill.amount === null) {
      errors.push(`Bill '${billName}': Missing required 'amount' field (or use 'price_history' for time-based pricing)`);
    }
    if (!("recurrence" in bill)) {
      if (["every", "interval", "kind", "start"].some((key) => key in bill)) {
        errors.push(`Bill '${billName}': Recurrence fields should be nested under 'recurrence:' key`);
      } else {
        errors.push(`Bill '${billName}': Missing required 'recurrence' field (or use 'price_history' for time-based pricing)`);
      }
    }
  }
  return errors;
};

const payeeStructureErrors = (payee: RawRecord, payeeName: string): string[] => {
  const errors: string[] = [];
  const schedules = pick(payee, "pay_schedules", "paySchedules") ?? [];

  if (!Array.isArray(schedules)) {
    errors.push(`Payee '${payeeName}': 'pay_schedules' should be a list`);
  } else if (!schedules.length) {
    errors.push(`Payee '${payeeName}': No pay schedules defined`);
  } else {
    schedules.forEach((schedule, index) => {
      if (!isRecord(schedule)) return;
      const prefix = `Payee '${payeeName}', Schedule #${index + 1}`;
      if (!("recurrence" in schedule)) {
        errors.push(`${prefix}: Missing required 'recurrence' field`);
      } else if (schedule.recurrence !== null) {
        errors.push(...recurrenceErrors(schedule.recurrence, prefix));
      }
      const percentage = pick(schedule, "contribution_percentage", "contributionPercentage");
      if (percentage !== undefined && percentage !== null && !(isFiniteNumber(percentage) && percentage >= 0)) {
        errors.push(`${prefix}: 'contribution_percentage' must be a non-negative number`);
      }
    });
  }

  const startDate = pick(payee, "start_date", "startDate");
  if (startDate !== undefined && startDate !== null && !isValidYMDString(startDate)) {
    errors.push(`Payee '${payeeName}': Invalid start_date: ${String(startDate)}`);
  }

  const defaultShare = pick(payee, "default_share_percentage", "defaultSharePercentage");
  if (defaultShare !== undefined && defaultShare !== null) {
    if (!isFiniteNumber(defaultShare)) {
      errors.push(`Payee '${payeeName}': 'default_share_percentage' must be a number`);
    } else if (defaultShare < 0 || defaultShare > 100) {
      errors.push(`Payee '${payeeName}': 'default_share_percentage' must be between 0 and 100, got ${defaultShare}`);
    }
  }
  return errors;
};

const shareStructureErrors = (share: unknown, billName: string, payeeNames: Set<string>): string[] => {
  const errors: string[] = [];
  if (!isRecord(share)) return errors;

  if (Array.isArray(share.exclude)) {
    for (const excluded of share.exclude) {
      if (!payeeNames.has(String(excluded))) {
        errors.push(`Bill '${billName}': Excluded payee '${String(excluded)}' not found in payees list`);
      }
    }
  }
  if (isRecord(share.custom)) {
    for (const [name, percentage] of Object.entries(share.custom)) {
      if (!payeeNames.has(name)) {
        errors.push(`Bill '${billName}': Custom payee '${name}' not found in payees list`);
      }
      if (!isFiniteNumber(percentage)) {
        errors.push(`Bill '${billName}': Custom percentage for '${name}' must be a number`);
      } else if (percentage < 0 || percentage > 100) {
        errors.push(`Bill '${billName}': Custom percentage for '${name}' must be between 0 and 100, got ${percentage}`);
      }
    }
  }
  return errors;
};

/**
 * Check a persisted state payload for structural and sharing problems.
 * @returns Human-readable error messages; empty when the payload is usable.
 */
export const validateStateStructure = (raw: unknown): string[] => {
  if (!isRecord(raw)) return ["State payload must be an object"];

  const errors: string[] = [];
  const bills = Array.isArray(raw.bills) ? raw.bills : [];
  const payees = Array.isArray(raw.payees) ? raw.payees : [];

  bills.forEach((bill, index) => {
    if (!isRecord(bill)) return;
    errors.push(...billStructureErrors(bill, optionalString(bill.name) ?? `Bill #${index + 1}`));
  });

  payees.forEach((payee, index) => {
    if (!isRecord(payee)) return;
    errors.push(...payeeStructureErrors(payee, optionalString(payee.name) ?? `Payee #${index + 1}`));
  });

  const normalizedPayees = payees
    .map((payee) => normalizePayee(payee))
    .filter((payee): payee is Payee => payee !== null);
  const payeeNames = new Set(normalizedPayees.map((payee) => payee.name));

  bills.forEach((bill, index) => {
    if (!isRecord(bill) || bill.share === undefined || bill.share === null) return;
    const billName = optionalString(bill.name) ?? `Bill #${index + 1}`;
    errors.push(...shareStructureErrors(bill.share, billName, payeeNames));

    const share = normalizeBillShare(bill.share);
    const { valid, message } = validateBillShares({ name: billName, priceHistory: [], share }, normalizedPayees);
    if (!valid) errors.push(`Bill '${billName}': ${message}`);
  });

  return errors;
};

/**
 * Throw when the in-memory model would not survive a save/load round trip.
 */
export const assertValidState = (state: HouseholdState): void => {
  const errors = validateStateStructure(serializeState(state));
  if (errors.length) throw new Error(errors.join("\n"));
};
