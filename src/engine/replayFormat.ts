export const REPLAY_FORMAT_VERSION = 1 as const;

// Versions the player can replay. A newer engine lists older formats here.
export const SUPPORTED_REPLAY_VERSIONS: readonly number[] = [REPLAY_FORMAT_VERSION];

export function isSupportedReplayVersion(version: number): boolean {
  return SUPPORTED_REPLAY_VERSIONS.includes(version);
}
