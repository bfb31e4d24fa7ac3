export type {
  Vector,
  SourceVector,
  RandomSource,
  StabilizerConfig,
  ConfigParseResult,
  StabilizationStep,
} from './types/index.js';
