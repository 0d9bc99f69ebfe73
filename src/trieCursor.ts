import { TrieNode } from './trieNode'
import { type KeyJoiner, type TrieEntry } from './types'

interface CursorFrame<E, V> {
    node: TrieNode<E, V>
    prefix: E[]
}

/**
 * Forward-only, single-pass walk over the value-bearing nodes below `root`.
 * A node's own entry comes before its descendants and siblings come in the
 * order their branches were created. The trie must not be mutated while a
 * cursor is in use; start a new cursor to iterate again.
 */
export class TrieCursor<E, V, K> implements IterableIterator<TrieEntry<K, V>> {
    private _stack: Array<CursorFrame<E, V>> = []
    private readonly _joinKey: KeyJoiner<E, K>

    constructor(root: TrieNode<E, V>, joinKey: KeyJoiner<E, K>) {
        this._joinKey = joinKey
        this._stack.push({ node: root, prefix: [] })
    }

    get done(): boolean {
        this._skipToValue()
        return this._stack.length === 0
    }

    next(): IteratorResult<TrieEntry<K, V>, undefined> {
        this._skipToValue()
        const frame = this._stack.pop()
        const slot = frame?.node.slot
        if (frame == null || slot == null) {
            return { done: true, value: undefined }
        }
        this._pushChildren(frame.node, frame.prefix)
        return { done: false, value: [this._joinKey(frame.prefix), slot.value] }
    }

    [Symbol.iterator](): this {
        return this
    }

    // expands frames without a value until one with a value is on top
    private _skipToValue(): void {
        let top = this._stack.at(-1)
        while (top != null && top.node.slot == null) {
            this._stack.pop()
            this._pushChildren(top.node, top.prefix)
            top = this._stack.at(-1)
        }
    }

    // reversed so the first child is popped first
    private _pushChildren(node: TrieNode<E, V>, prefix: E[]): void {
        if (node.children == null) return
        const children = Array.from(node.children)
        for (let i = children.length - 1; i >= 0; i--) {
            const [element, child] = children[i]
            this._stack.push({ node: child, prefix: [...prefix, element] })
        }
    }
}
