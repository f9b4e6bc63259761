export * from './ExecutionClient';
export * from './FeedSource';
