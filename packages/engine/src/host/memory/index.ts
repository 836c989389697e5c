export * from './MemoryStore'
export * from './MemoryToken'
export * from './MockAuth'
export * from './ManualClock'
export * from './InMemoryHost'
