export {
  type RandomSource,
  systemRandom,
  createSeededRandom,
  createRandomSource,
} from './random.js';

export {
  type UsageCounts,
  calculateWeights,
  weightedChoice,
  pickLeastUsed,
} from './usage-weighter.js';
