export * from './invoice'
export * from './workflow'
export * from './capability'
export * from './checkpoint'
