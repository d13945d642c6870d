export {
  RequestBuilder,
  createRequest,
  type RestResponse,
  type SendResult,
  type RetryPredicate,
  type RetryPolicy,
  type RequestOptions,
  type ValueInput,
  type ValueMapInput,
} from './builder.js';
export {
  RestClient,
  restClientConfigSchema,
  type RestClientConfig,
  type RestClientConfigInput,
} from './client.js';
export {
  parseRequestUrl,
  hasControlCharacter,
  validateMethod,
  escapeQueryComponent,
  encodeQuery,
  compareCodePoints,
  describeUrl,
  buildTransportRequest,
  type AssemblyInput,
} from './assembly.js';
