import { type ValueRef } from './types'

/**
 * One position in the key path space. `element` labels the edge from the
 * parent; the root's element is never read.
 */
export class TrieNode<E, V> {
    public readonly element: E | undefined
    public children?: Map<E, TrieNode<E, V>>
    public slot?: ValueRef<V>

    constructor(element?: E) {
        this.element = element
    }

    hasValue(): boolean {
        return this.slot != null
    }

    getChild(element: E): TrieNode<E, V> | undefined {
        return this.children?.get(element)
    }

    getOrAddChild(element: E): TrieNode<E, V> {
        if (this.children == null) this.children = new Map()
        let child = this.children.get(element)
        if (child == null) {
            child = new TrieNode<E, V>(element)
            this.children.set(element, child)
        }
        return child
    }

    removeChild(element: E): boolean {
        return this.children?.delete(element) ?? false
    }

    // no value and nothing below it
    isPrunable(): boolean {
        return this.slot == null && (this.children == null || this.children.size === 0)
    }
}
