import { EmptyKeyError, KeyNotFoundError, MissingDefaultValueError } from './errors'
import { TrieCursor } from './trieCursor'
import { TrieNode } from './trieNode'
import { type InsertResult, type KeyJoiner, type TrieEntry, type TrieOptions, type ValueRef } from './types'

/**
 * Prefix tree mapping keys (sequences of `E`) to values of type `V`. Keys are
 * accepted as any iterable of elements and handed back as `K` when iterating.
 *
 * Value references returned by `getOrCreate`, `insert`, `at` and `find` are
 * live: assigning `ref.value` updates the stored value in place.
 */
export abstract class BaseTrie<E, V, K> implements Iterable<TrieEntry<K, V>> {
    private _root: TrieNode<E, V> = new TrieNode<E, V>()
    private _size: number = 0
    private readonly _defaultValue?: () => V

    constructor(options?: Partial<TrieOptions<V>>) {
        this._defaultValue = options?.defaultValue
    }

    protected abstract joinKey(elements: readonly E[]): K

    get size(): number {
        return this._size
    }

    isEmpty(): boolean {
        return this._size === 0
    }

    clear(): void {
        this._root = new TrieNode<E, V>()
        this._size = 0
    }

    /**
     * Returns the value stored at `key`, creating the missing path and a
     * default value when nothing is stored there yet.
     */
    getOrCreate(key: Iterable<E>, createDefault?: () => V): ValueRef<V> {
        const elements = Array.from(key)
        const existing = this._findNode(elements)
        if (existing?.slot != null) return existing.slot

        const makeValue = createDefault ?? this._defaultValue
        if (elements.length === 0) throw new EmptyKeyError()
        if (makeValue == null) throw new MissingDefaultValueError(elements)

        // the factory may throw; build the path only once a value exists
        const value = makeValue()
        const node = this._findOrMakeNode(elements)
        node.slot = { value }
        this._size += 1
        return node.slot
    }

    /**
     * Stores `value` only if nothing is stored at `key` yet. The returned
     * reference points at whichever value ends up stored.
     */
    insert(key: Iterable<E>, value: V): InsertResult<V> {
        const node = this._findOrMakeNode(Array.from(key))
        if (node.slot != null) {
            return { ref: node.slot, inserted: false }
        }

        node.slot = { value }
        this._size += 1
        return { ref: node.slot, inserted: true }
    }

    set(key: Iterable<E>, value: V): this {
        const ref = this.insert(key, value).ref
        ref.value = value
        return this
    }

    at(key: Iterable<E>): ValueRef<V> {
        const elements = Array.from(key)
        const node = this._findNode(elements)
        if (node?.slot == null) throw new KeyNotFoundError(elements)
        return node.slot
    }

    find(key: Iterable<E>): ValueRef<V> | undefined {
        return this._findNode(Array.from(key))?.slot
    }

    get(key: Iterable<E>): V | undefined {
        return this.find(key)?.value
    }

    contains(key: Iterable<E>): boolean {
        return this._findNode(Array.from(key))?.hasValue() ?? false
    }

    hasPrefix(prefix: Iterable<E>): boolean {
        return this._findNode(Array.from(prefix)) != null
    }

    /**
     * Removes the value at `key` and prunes every node left with neither a
     * value nor children. Returns false, changing nothing, when no value is
     * stored at `key`.
     */
    erase(key: Iterable<E>): boolean {
        return this._eraseFrom(this._root, Array.from(key), 0)
    }

    cursor(): TrieCursor<E, V, K> {
        return new TrieCursor<E, V, K>(this._root, (elements) => this.joinKey(elements))
    }

    entries(): TrieCursor<E, V, K> {
        return this.cursor()
    }

    *keys(): IterableIterator<K> {
        for (const [key] of this.cursor()) yield key
    }

    *values(): IterableIterator<V> {
        for (const [, value] of this.cursor()) yield value
    }

    forEach(callback: (value: V, key: K, trie: this) => void): void {
        for (const [key, value] of this.cursor()) callback(value, key, this)
    }

    [Symbol.iterator](): TrieCursor<E, V, K> {
        return this.cursor()
    }

    private _findNode(elements: readonly E[]): TrieNode<E, V> | undefined {
        let current: TrieNode<E, V> | undefined = this._root
        for (const element of elements) {
            current = current.getChild(element)
            if (current == null) return undefined
        }
        return current
    }

    // the root is a sentinel and never holds a value
    private _findOrMakeNode(elements: readonly E[]): TrieNode<E, V> {
        if (elements.length === 0) throw new EmptyKeyError()
        let current = this._root
        for (const element of elements) {
            current = current.getOrAddChild(element)
        }
        return current
    }

    private _eraseFrom(node: TrieNode<E, V>, elements: readonly E[], depth: number): boolean {
        if (depth === elements.length) {
            if (node.slot == null) return false
            node.slot = undefined
            this._size -= 1
            return true
        }

        const element = elements[depth]
        const child = node.getChild(element)
        if (child == null || !this._eraseFrom(child, elements, depth + 1)) return false

        if (child.isPrunable()) node.removeChild(element)
        return true
    }
}

/**
 * Trie over arbitrary element types. Keys come back as arrays of elements.
 */
export class Trie<E, V> extends BaseTrie<E, V, E[]> {
    protected joinKey(elements: readonly E[]): E[] {
        return [...elements]
    }
}

/**
 * Trie keyed by strings, one node per code point. Keys come back as strings.
 */
export class StringTrie<V> extends BaseTrie<string, V, string> {
    protected joinKey(elements: readonly string[]): string {
        return elements.join('')
    }
}

export { EmptyKeyError, KeyNotFoundError, MissingDefaultValueError } from './errors'
export { TrieCursor } from './trieCursor'
export type { InsertResult, KeyJoiner, TrieEntry, TrieOptions, ValueRef } from './types'
