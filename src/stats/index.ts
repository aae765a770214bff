export { StatsAggregator } from './aggregator.js';
