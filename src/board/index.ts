export * from './types.js';
export * from './classifier.js';
export {
  TrelloBoardClient,
  UpstreamError,
  listEntryTimes,
  type BoardClient,
  type BoardFetchFailure,
  type BoardFetchResult,
  type FetchBoardOptions,
  type TrelloBoardClientOptions,
} from './board-client.js';
