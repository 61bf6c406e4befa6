export interface EngineConfig {
  /** `CHESS_ENGINE_LOG=1` turns on debug lines. */
  debugLog: boolean;
  /** `CHESS_RANDOM_SEED`; used by random players created without a seed. */
  randomSeed: string | null;
}

export function readEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const seed = env.CHESS_RANDOM_SEED;
  return {
    debugLog: env.CHESS_ENGINE_LOG === "1",
    randomSeed: seed && seed.trim() ? seed.trim() : null,
  };
}
