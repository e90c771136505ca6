export * from './types';
export * from './errors';
export * from './config';
export * from './blockSource/types';
export * from './blockSource/connectionBlockSource';
export * from './classifier/transactionClassifier';
export * from './traversal/windowTraversal';
export * from './math/throughput';
export * from './util/blockTime';
export * from './tpsCalculator';
