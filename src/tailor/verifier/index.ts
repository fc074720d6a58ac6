export * from './modificationVerifier';
export * from './stateMachine';
