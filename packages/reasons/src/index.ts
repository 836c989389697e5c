export * from './factory'
export * from './errors'
