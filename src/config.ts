export interface Config {
    wordFileName: string
    topWordCount: number
    logEveryNthLine: number
    stopWords: string[]
}

const DEFAULT_WORD_FILE_NAME = 'data/sample-words.txt'
const DEFAULT_TOP_WORD_COUNT = 10
const DEFAULT_LOG_EVERY_NTH_LINE = 1000

const parsePositiveInteger = (name: string, raw: string | undefined, fallback: number): number => {
    if (raw == null || raw.trim() === '') return fallback
    const parsed = Number(raw)
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new Error(`Invalid ${name}: expected a positive integer but got '${raw}'`)
    }
    return parsed
}

const parseList = (raw: string | undefined): string[] => {
    if (raw == null) return []
    return raw.split(',')
        .map((entry) => entry.trim().toLowerCase())
        .filter((entry) => entry.length > 0)
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
    return {
        wordFileName: env.WORD_FILE_NAME ?? DEFAULT_WORD_FILE_NAME,
        topWordCount: parsePositiveInteger('TOP_WORD_COUNT', env.TOP_WORD_COUNT, DEFAULT_TOP_WORD_COUNT),
        logEveryNthLine: parsePositiveInteger('LOG_EVERY_NTH_LINE', env.LOG_EVERY_NTH_LINE, DEFAULT_LOG_EVERY_NTH_LINE),
        stopWords: parseList(env.STOP_WORDS)
    }
}
