export interface ValueRef<V> {
    value: V
}

export interface InsertResult<V> {
    ref: ValueRef<V>
    inserted: boolean
}

export type TrieEntry<K, V> = [key: K, value: V]

// builds the public key from the elements along a root-to-node path
export type KeyJoiner<E, K> = (elements: readonly E[]) => K

export interface TrieOptions<V> {
    defaultValue: () => V
}
