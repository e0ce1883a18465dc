export * from './builders';
export * from './graph';
export * from './printer';
