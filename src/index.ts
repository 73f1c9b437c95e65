/**
 * Household bill splitter public API
 */

export * from './types';
export * from './modules/dateUtils';
export * from './modules/recurrence';
export * from './modules/scheduleOptions';
export * from './modules/bills';
export * from './modules/income';
export * from './modules/allocation';
export * from './modules/scheduler';
export * from './modules/validation';
export * from './modules/storage';
export * from './modules/calculations';
export * from './modules/exportSchedule';
export * from './utils/payeeColors';
export * from './store/useHouseholdStore';
export * from './components';
