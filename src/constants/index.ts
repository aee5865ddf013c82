export * from './enums';
export * from './analytics-config';
export * from './seed-config';
