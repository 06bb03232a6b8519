export {
  BestPerGroupReducer,
  BEST_RETURN_PER_EPISODE,
  compareIntegerKeys,
  createBestReturnReducer,
  type GroupRanking,
} from './reducer.js';
