export * from './rate-limiter';
export * from './scheduler';
export * from './scheduling.module';
