export * from './completion';
export * from './program';
