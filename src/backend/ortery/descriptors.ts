/**
 * A command or property the vendor tool reports by numeric id.
 */
export interface Descriptor {
  /** Vendor SDK constant name (e.g., `otadDEVICE_COMMAND_TURNTABLE_STOP`). */
  name: string;
  /** Numeric id used on the command line. */
  value: number;
  description: string;
}

export interface KnownDescriptor extends Descriptor {
  known: true;
}

/** Placeholder for an id missing from the static tables. */
export interface UnknownDescriptor {
  known: false;
  value: number;
}

export type DescriptorLookup = KnownDescriptor | UnknownDescriptor;

function freezeTable(entries: readonly Descriptor[]): ReadonlyMap<number, Readonly<KnownDescriptor>> {
  return new Map(
    entries.map((d): [number, Readonly<KnownDescriptor>] => [d.value, Object.freeze({ known: true as const, ...d })])
  );
}

export const COMMAND_IDS = {
  shutterReleaseOff: 12801,
  shutterReleaseHalfway: 12802,
  shutterReleaseCompletely: 12803,
  turntableStop: 13057,
  turntableRelease: 13058,
} as const;

export const PROPERTY_IDS = {
  turntableState: 16641,
  turntableTotalSteps: 16643,
} as const;

const TURNTABLE_STATE: Descriptor = {
  name: "otadDEVICE_PROPERTY_TURNTABLE_STATE",
  value: PROPERTY_IDS.turntableState,
  description: "State of turntable",
};

/** Commands a device may list via `get_command_desc`. */
export const COMMAND_TABLE = freezeTable([
  {
    name: "otadDEVICE_COMMAND_CABLERLEASE_OFF",
    value: COMMAND_IDS.shutterReleaseOff,
    description: "Shutter Release OFF",
  },
  {
    name: "otadDEVICE_COMMAND_CABLERLEASE_HALFWAY",
    value: COMMAND_IDS.shutterReleaseHalfway,
    description: "Shutter Release Halfway (Focus)",
  },
  {
    name: "otadDEVICE_COMMAND_CABLERLEASE_COMPLETELY",
    value: COMMAND_IDS.shutterReleaseCompletely,
    description: "Shutter Release Completely (Snap)",
  },
  {
    name: "otadDEVICE_COMMAND_TURNTABLE_STOP",
    value: COMMAND_IDS.turntableStop,
    description: "Stop the turntable",
  },
  {
    name: "otadDEVICE_COMMAND_TURNTABLE_RELEASE",
    value: COMMAND_IDS.turntableRelease,
    description: "Release the motor of turntable",
  },
  // The tool reports the state property in the command list as well.
  TURNTABLE_STATE,
]);

/** Properties a device may list via `get_property_desc`. */
export const PROPERTY_TABLE = freezeTable([
  TURNTABLE_STATE,
  {
    name: "otadDEVICE_PROPERTY_TURNTABLE_TOTAL_STEPS",
    value: PROPERTY_IDS.turntableTotalSteps,
    description: "Total step of turntable",
  },
]);

function lookup(table: ReadonlyMap<number, Readonly<KnownDescriptor>>, id: number): DescriptorLookup {
  return table.get(id) ?? { known: false, value: id };
}

export function lookupCommand(id: number): DescriptorLookup {
  return lookup(COMMAND_TABLE, id);
}

export function lookupProperty(id: number): DescriptorLookup {
  return lookup(PROPERTY_TABLE, id);
}
