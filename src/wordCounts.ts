import { createInterface } from 'readline'
import { type Readable } from 'stream'
import { StringContainer } from './stringContainer'
import { StringTrie } from './trie'
import { type TrieEntry } from './types'

export interface WordCountOptions {
    stopWords: StringContainer
    onLine: (lineNumber: number, wordCount: number) => void
}

// letters and digits, with inner apostrophes kept ("don't")
const WORD_PATTERN = /[\p{L}\p{N}]+(?:'[\p{L}\p{N}]+)*/gu

export const splitWords = (line: string): string[] => {
    return line.toLowerCase().match(WORD_PATTERN) ?? []
}

export const countWords = async (input: Readable, options?: Partial<WordCountOptions>): Promise<StringTrie<number>> => {
    const stopWords = options?.stopWords ?? new StringContainer()
    const onLine = options?.onLine ?? (() => {})
    const counts = new StringTrie<number>({ defaultValue: () => 0 })
    const lines = createInterface({ input, crlfDelay: Infinity })

    let lineNumber = 0
    for await (const line of lines) {
        lineNumber += 1
        const words = splitWords(line).filter((word) => !stopWords.contains(word))
        for (const word of words) {
            counts.getOrCreate(word).value += 1
        }
        onLine(lineNumber, words.length)
    }

    return counts
}

/**
 * Highest counts first. Equal counts keep the trie's traversal order.
 */
export const topWords = (counts: StringTrie<number>, limit: number): Array<TrieEntry<string, number>> => {
    return Array.from(counts)
        .sort(([, a], [, b]) => b - a)
        .slice(0, limit)
}
