export * from './requests.schema'
