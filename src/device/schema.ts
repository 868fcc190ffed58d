/**
 * Device Module - Schemas and Types
 *
 * The closed set of recognized device variants and the capability matrix
 * that defines them. Each variant's handle type is derived from its row in
 * the matrix, so the types and the matrix cannot disagree.
 */
import type {
  CapabilityName,
  DeviceActions,
  Dimmer,
  EnergyMeter,
  InfoQuery,
  Switch,
} from "../capabilities/index.js";
import type { DeviceAddress, Transport } from "../transport/index.js";

// =============================================================================
// Models
// =============================================================================

/**
 * Recognized hardware types, matched as prefixes of the reported model
 * string (e.g. "HS110(EU)").
 */
export const KNOWN_MODELS = ["HS100", "HS110", "LB110", "HS220"] as const;

export type KnownModel = (typeof KNOWN_MODELS)[number];

/**
 * Variant tag. Anything unrecognized is "unknown".
 */
export type DeviceModel = KnownModel | "unknown";

// =============================================================================
// Capability Matrix
// =============================================================================

/**
 * Capabilities per variant. The "unknown" variant supports the info query
 * only.
 */
export const MODEL_CAPABILITIES = {
  HS100: ["switch", "actions"],
  HS110: ["switch", "energy", "actions"],
  LB110: ["switch", "dimmer", "energy", "actions"],
  HS220: ["switch", "dimmer", "actions"],
  unknown: [],
} as const satisfies Readonly<
  Record<DeviceModel, ReadonlyArray<CapabilityName>>
>;

/**
 * Interface implementing each capability.
 */
export type CapabilityInterfaces = {
  switch: Switch;
  dimmer: Dimmer;
  energy: EnergyMeter;
  actions: DeviceActions;
};

type UnionToIntersection<U> = (
  U extends unknown ? (arg: U) => void : never
) extends (arg: infer I) => void
  ? I
  : never;

// =============================================================================
// Device Handles
// =============================================================================

/**
 * Fields and operations shared by every variant.
 */
export type DeviceBase<M extends DeviceModel> = Readonly<{
  model: M;
  address: DeviceAddress;
}> &
  InfoQuery;

/**
 * Handle type of one variant: the base plus every capability in its row.
 */
export type DeviceOf<M extends DeviceModel> = DeviceBase<M> &
  UnionToIntersection<
    CapabilityInterfaces[(typeof MODEL_CAPABILITIES)[M][number]]
  >;

export type HS100 = DeviceOf<"HS100">;
export type HS110 = DeviceOf<"HS110">;
export type LB110 = DeviceOf<"LB110">;
export type HS220 = DeviceOf<"HS220">;
export type UnknownDevice = DeviceOf<"unknown">;

/**
 * Tagged union over all variants; narrow on `model`.
 */
export type Device = HS100 | HS110 | LB110 | HS220 | UnknownDevice;

/**
 * Variants that implement a capability.
 */
export type WithCapability<C extends CapabilityName> = Extract<
  Device,
  CapabilityInterfaces[C]
>;

// =============================================================================
// Construction
// =============================================================================

export type DeviceOptions = Readonly<{
  /** Defaults to a TCP transport configured from the environment */
  transport?: Transport;
}>;

/**
 * Direct construction of one variant from a bare address. No I/O.
 */
export type DeviceConstructor<D extends Device> = (
  address: DeviceAddress,
  options?: DeviceOptions,
) => D;
