export { HomeworkApiClient } from './HomeworkApiClient.js';
export { FetchTransport } from './FetchTransport.js';
export { extractHomeworks, extractCurrentDate, isRecord } from './responseParser.js';
export {
  describeStatus,
  readHomeworkId,
  toHomeworkRecord,
  isVerdictCode,
  VERDICTS,
} from './statusTranslator.js';
export type {
  VerdictCode,
  HomeworkId,
  HomeworkRecord,
  RequestParams,
  TransportResponse,
  HttpTransport,
  HomeworkApiClientConfig,
} from './types.js';
