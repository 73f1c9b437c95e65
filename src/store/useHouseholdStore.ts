/**
 * Zustand store for household state management
 */

import { createStore } from 'zustand/vanilla';
import type { StoreApi } from 'zustand/vanilla';
import type {
  Bill,
  BillPriceEntry,
  HouseholdState,
  KeyValueStorage,
  Payee,
  PaymentScheduleResult,
  PaySchedule,
  ScheduleOptions,
  SchedulerOptions,
} from '../types';
import { compareYMD } from '../modules/dateUtils';
import { calculateProportionalContributions } from '../modules/scheduler';
import { createFileStorage, loadState, saveState } from '../modules/storage';
import {
  assertValidState,
  defaultState,
  normalizeState,
  validateCutoffDay,
  validateMonth,
  validateProjectionMonths,
  validateYear,
} from '../modules/validation';

interface HouseholdActions {
  // Actions for bills
  addBill: (bill: Bill) => void;
  updateBill: (name: string, updates: Partial<Bill>) => void;
  removeBill: (name: string) => void;
  addPriceChange: (billName: string, entry: BillPriceEntry) => void;

  // Actions for payees
  addPayee: (payee: Payee) => void;
  updatePayee: (name: string, updates: Partial<Payee>) => void;
  removePayee: (name: string) => void;
  addPaySchedule: (payeeName: string, schedule: PaySchedule) => void;
  removePaySchedule: (payeeName: string, index: number) => void;

  // Actions for settings
  updateScheduleOptions: (options: Partial<ScheduleOptions>) => void;

  // Global actions
  importData: (data: unknown) => void;
  resetToDefaults: () => void;
  generateSchedule: (
    startMonth: number,
    startYear: number,
    monthsAhead?: number,
    options?: SchedulerOptions
  ) => PaymentScheduleResult;
}

export type HouseholdStore = HouseholdState & HouseholdActions;

const sortHistory = (history: readonly BillPriceEntry[]): BillPriceEntry[] =>
  [...history].sort((a, b) => compareYMD(a.startDate, b.startDate));

/**
 * Create a household store persisted through the given storage.
 * Every change is validated first; an invalid change throws and leaves the
 * state untouched.
 */
export const createHouseholdStore = (
  storage: KeyValueStorage = createFileStorage()
): StoreApi<HouseholdStore> =>
  createStore<HouseholdStore>()((set, get) => {
    const snapshot = (): HouseholdState => {
      const { bills, payees, scheduleOptions } = get();
      return { bills, payees, scheduleOptions };
    };

    const commit = (next: HouseholdState): void => {
      assertValidState(next);
      set(next);
      saveState(next, storage);
    };

    const findBill = (name: string): Bill => {
      const bill = get().bills.find((b) => b.name === name);
      if (!bill) throw new Error(`Bill '${name}' not found`);
      return bill;
    };

    const findPayee = (name: string): Payee => {
      const payee = get().payees.find((p) => p.name === name);
      if (!payee) throw new Error(`Payee '${name}' not found`);
      return payee;
    };

    const replaceBill = (name: string, bill: Bill): void => {
      const state = snapshot();
      commit({ ...state, bills: state.bills.map((b) => (b.name === name ? bill : b)) });
    };

    const replacePayee = (name: string, payee: Payee, bills: Bill[] = get().bills): void => {
      const state = snapshot();
      commit({ ...state, bills, payees: state.payees.map((p) => (p.name === name ? payee : p)) });
    };

    return {
      ...loadState(storage),

      // Bill actions
      addBill: (bill) => {
        if (get().bills.some((b) => b.name === bill.name)) {
          throw new Error(`Bill '${bill.name}' already exists`);
        }
        if (!bill.priceHistory.length) {
          throw new Error(`Bill '${bill.name}' needs at least one price`);
        }
        const state = snapshot();
        commit({ ...state, bills: [...state.bills, { ...bill, priceHistory: sortHistory(bill.priceHistory) }] });
      },

      updateBill: (name, updates) => {
        const bill = findBill(name);
        if (updates.name && updates.name !== name && get().bills.some((b) => b.name === updates.name)) {
          throw new Error(`Bill '${updates.name}' already exists`);
        }
        const next = { ...bill, ...updates };
        replaceBill(name, { ...next, priceHistory: sortHistory(next.priceHistory) });
      },

      removeBill: (name) => {
        findBill(name);
        const state = snapshot();
        commit({ ...state, bills: state.bills.filter((b) => b.name !== name) });
      },

      addPriceChange: (billName, entry) => {
        const bill = findBill(billName);
        replaceBill(billName, { ...bill, priceHistory: sortHistory([...bill.priceHistory, entry]) });
      },

      // Payee actions
      addPayee: (payee) => {
        if (get().payees.some((p) => p.name === payee.name)) {
          throw new Error(`Payee '${payee.name}' already exists`);
        }
        const state = snapshot();
        commit({ ...state, payees: [...state.payees, payee] });
      },

      updatePayee: (name, updates) => {
        const payee = findPayee(name);
        const newName = updates.name ?? name;
        if (newName !== name && get().payees.some((p) => p.name === newName)) {
          throw new Error(`Payee '${newName}' already exists`);
        }

        // Carry the rename into every bill's sharing rules
        const bills = newName === name
          ? get().bills
          : get().bills.map((bill) => {
              const custom = Object.fromEntries(
                Object.entries(bill.share.custom).map(([key, value]) => [key === name ? newName : key, value])
              );
              const exclude = bill.share.exclude.map((excluded) => (excluded === name ? newName : excluded));
              return { ...bill, share: { exclude, custom } };
            });

        replacePayee(name, { ...payee, ...updates, name: newName }, bills);
      },

      removePayee: (name) => {
        findPayee(name);
        const state = snapshot();
        commit({
          ...state,
          payees: state.payees.filter((p) => p.name !== name),
          bills: state.bills.map((bill) => {
            const custom = { ...bill.share.custom };
            delete custom[name];
            return { ...bill, share: { exclude: bill.share.exclude.filter((excluded) => excluded !== name), custom } };
          }),
        });
      },

      addPaySchedule: (payeeName, schedule) => {
        const payee = findPayee(payeeName);
        replacePayee(payeeName, { ...payee, paySchedules: [...payee.paySchedules, schedule] });
      },

      removePaySchedule: (payeeName, index) => {
        const payee = findPayee(payeeName);
        if (!Number.isInteger(index) || index < 0 || index >= payee.paySchedules.length) {
          throw new Error(`Payee '${payeeName}' has no pay schedule #${index + 1}`);
        }
        replacePayee(payeeName, { ...payee, paySchedules: payee.paySchedules.filter((_, i) => i !== index) });
      },

      // Settings actions
      updateScheduleOptions: (options) => {
        const next: ScheduleOptions = { ...get().scheduleOptions, ...options };
        validateCutoffDay(next.cutoffDay);
        validateProjectionMonths(next.defaultProjectionMonths);
        commit({ ...snapshot(), scheduleOptions: next });
      },

      // Global actions
      importData: (data) => {
        commit(normalizeState(data, { strict: true }));
      },

      resetToDefaults: () => {
        commit(defaultState());
      },

      generateSchedule: (startMonth, startYear, monthsAhead, options) => {
        const month = validateMonth(startMonth);
        const year = validateYear(startYear);
        const months = validateProjectionMonths(monthsAhead ?? get().scheduleOptions.defaultProjectionMonths);
        return calculateProportionalContributions(snapshot(), month, year, months, options);
      },
    };
  });
