import { StringTrie } from './trie'

/**
 * Set of strings optimized for insertion and 'contains' operations, backed by
 * a string trie. The trie cannot hold the empty string, so it is tracked here.
 */
export class StringContainer implements Iterable<string> {
    private _trie: StringTrie<true> = new StringTrie<true>()
    private _hasEmpty: boolean = false

    constructor(strings?: Iterable<string>) {
        if (strings == null) return
        for (const s of strings) this.insert(s)
    }

    get size(): number {
        return this._trie.size + (this._hasEmpty ? 1 : 0)
    }

    // returns false when `s` was already present
    insert(s: string): boolean {
        if (s.length === 0) {
            if (this._hasEmpty) return false
            this._hasEmpty = true
            return true
        }
        return this._trie.insert(s, true).inserted
    }

    contains(s: string): boolean {
        if (s.length === 0) return this._hasEmpty
        return this._trie.contains(s)
    }

    delete(s: string): boolean {
        if (s.length === 0) {
            const had = this._hasEmpty
            this._hasEmpty = false
            return had
        }
        return this._trie.erase(s)
    }

    hasPrefix(prefix: string): boolean {
        return this._trie.hasPrefix(prefix)
    }

    clear(): void {
        this._trie.clear()
        this._hasEmpty = false
    }

    // the empty string comes first, as it prefixes every other string
    *values(): IterableIterator<string> {
        if (this._hasEmpty) yield ''
        yield* this._trie.keys()
    }

    [Symbol.iterator](): IterableIterator<string> {
        return this.values()
    }
}
