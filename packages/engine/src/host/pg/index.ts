export * from './PgHost'
