import type { Principal, StorageUri } from "@afterword/types";

export const POST_SUNSET_LICENSES = ["cc0", "public-domain", "neutral-stewardship"] as const;

export type PostSunsetLicense = (typeof POST_SUNSET_LICENSES)[number];

export function isPostSunsetLicense(value: unknown): value is PostSunsetLicense {
  return POST_SUNSET_LICENSES.some((license) => license === value);
}

/**
 * Progress through the sunset protocol. Each flag is one-way and
 * requires the one before it.
 */
export interface SunsetState {
  readonly principal: Principal;
  readonly initiatedAt: number;
  /** True when the engine was sunset through the permissionless path */
  readonly emergency: boolean;
  readonly assetsArchived: boolean;
  readonly archives: readonly StorageUri[];
  readonly ipTransitioned: boolean;
  readonly postSunsetLicense?: PostSunsetLicense;
  readonly clustered: boolean;
  readonly clusterId?: string;
  readonly completed: boolean;
  readonly completedAt?: number;
}
