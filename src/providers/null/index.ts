export { NullProvider, NullResourceAttributesSchema, NULL_RESOURCE_KIND, NULL_PROVIDER_NAME } from './provider'
