export * from './generator'
export * from './composers'
export * from './templates'
