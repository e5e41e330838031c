export * from './query-mode.enum';
export * from './sort-order.enum';
