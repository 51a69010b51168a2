export { StatisticsReporter, formatStatistic } from './report';
