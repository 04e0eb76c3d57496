// Generic phantom-brand helper
export type Brand<Base, Tag extends string> = Base & { readonly __brand: Tag };

export type Hex = `0x${string}`;

export type Address = Brand<string, "Address">;
export type TxId = Brand<Hex, "TxId">;
export type BlockHash = Brand<Hex, "BlockHash">;

export const asAddress = (s: string): Address => s as Address;
export const asTxId = (h: Hex): TxId => h as TxId;
export const asBlockHash = (h: Hex): BlockHash => h as BlockHash;
