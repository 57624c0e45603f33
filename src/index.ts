export * from './detonation';
