#!/usr/bin/env node
import { createReadStream } from 'fs'
import * as dotenv from 'dotenv'
import consoleStamp from 'console-stamp'
import { loadConfig } from './config'
import { StringContainer } from './stringContainer'
import { countWords, topWords } from './wordCounts'
consoleStamp(console)
dotenv.config()

const main = async () => {
    const config = loadConfig()
    const stopWords = new StringContainer(config.stopWords)
    console.log(`Counting words in ${config.wordFileName} (ignoring ${stopWords.size} stop words)...`)

    const readStream = createReadStream(config.wordFileName, { encoding: 'utf8' })
    const counts = await countWords(readStream, {
        stopWords,
        onLine: (lineNumber, wordCount) => {
            if (lineNumber % config.logEveryNthLine === 0) {
                console.log(`Read line ${lineNumber} (${wordCount} words).`)
            }
        }
    })

    console.log(`Found ${counts.size} distinct words.`)
    for (const [word, count] of topWords(counts, config.topWordCount)) {
        console.log(`${word}: ${count}`)
    }
}

main().catch((err) => {
    console.error(err)
    process.exitCode = 1
})
