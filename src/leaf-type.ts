/**
 * Kinds of account attribute stored in the state tree. The numeric value is the
 * tag written into slot 6 of the key preimage.
 */
export enum LeafType {
    Balance = 0,
    Nonce = 1,
    Code = 2,
    Storage = 3,
    CodeLength = 4,
}

// Leaf types whose key depends on the address alone.
export type AccountLeafType = Exclude<LeafType, LeafType.Storage>
