export {
  makeDatasetHealthChecker,
  type DatasetHealthCheckerOptions,
} from './dataset-checker.js';
