export {
  type MockResponse,
  type MockReply,
  type RecordedCall,
  type MockTransportConfig,
  type MockTransport,
  createMockTransport,
  createFailThenSucceedTransport,
  createFailingTransport,
  createRespondingTransport,
  createSlowTransport,
  requestBodyText,
} from './mocks.js';
