export { LocalProvider, LocalFileAttributesSchema, LOCAL_FILE_KIND, LOCAL_PROVIDER_NAME } from './provider'
