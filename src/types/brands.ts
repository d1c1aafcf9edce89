// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Address = `0x${string}`;
export type Hex = `0x${string}`;

export type CheckpointId = Brand<number, "CheckpointId">;
export type SlotId = Brand<bigint, "SlotId">;

export const asCheckpointId = (n: number): CheckpointId => n as CheckpointId;
export const asSlotId = (n: bigint): SlotId => n as SlotId;
