export * from './attribute';
export * from './decorators';
export * from './errors';
export * from './locator';
export * from './registry';
export * from './decision-manager';
