export * from './method-security.types';
