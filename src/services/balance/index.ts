export { BalanceAggregator, BalanceSummary, UserStats } from './balance.service';
