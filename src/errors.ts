export class KeyNotFoundError<E = unknown> extends Error {
    public readonly key: readonly E[]

    constructor(key: readonly E[]) {
        super(`Key not found in trie: [${key.map((element) => String(element)).join(', ')}]`)
        this.name = 'KeyNotFoundError'
        this.key = key
    }
}

export class MissingDefaultValueError<E = unknown> extends Error {
    public readonly key: readonly E[]

    constructor(key: readonly E[]) {
        super(`No default value factory to create a value for key: [${key.map((element) => String(element)).join(', ')}]`)
        this.name = 'MissingDefaultValueError'
        this.key = key
    }
}

export class EmptyKeyError extends Error {
    constructor() {
        super('Cannot store a value under the empty key')
        this.name = 'EmptyKeyError'
    }
}
