export * from './caregiver';
export * from './diagnostics';
export * from './dose';
export * from './error';
export * from './medication';
export * from './user';
