import type { TestContext } from 'node:test'
import type { Transform } from 'node:stream'
import { sink } from 'pino-test'
import pino, { type Logger } from 'pino'
import type { BloomFilter } from '../src/index.ts'

export type LogMessage = {
  level: number
  msg: string
  [key: string]: unknown
}

type Spy = {
  buffer: LogMessage[],
  onMessage: (cb: (received: LogMessage) => void) => void,
  reset: () => void,
  _onMessage: (received: LogMessage) => void
}

export function createLogger ({ t }: { t: TestContext }): { logger: Logger, loggerSpy: Spy } {
  const loggerStream = sink()
  const logger = pino({ level: 'debug' }, loggerStream)
  const loggerSpy = listenLogger(loggerStream, t)

  return { logger, loggerSpy }
}

export function listenLogger (loggerStream: Transform, t: TestContext): Spy {
  const spy: Spy = {
    buffer: [],
    onMessage: (cb: (received: LogMessage) => void) => {
      spy._onMessage = cb
    },
    reset: () => {
      spy.buffer.length = 0
    },
    _onMessage: () => { }
  }

  const fn = (received: LogMessage) => {
    spy.buffer.push(received)
    spy._onMessage(received)
  }

  loggerStream.on('data', fn)

  t.after(() => {
    loggerStream.off('data', fn)
  })

  return spy
}

export function waitForLogMessage (spy: Spy, match: (received: LogMessage) => boolean, max = 200): Promise<void> {
  return new Promise((resolve, reject) => {
    const fn = (received: LogMessage) => {
      if (match(received)) {
        resolve()
      }
      count++
      if (count > max) {
        reject(new Error('Max message count reached on waitForLogMessage'))
      }
    }

    let count = 0
    for (const received of spy.buffer) {
      fn(received)
    }

    spy.onMessage(fn)
  })
}

export function makeKeys (prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}-${i}`)
}

export function measureFalsePositiveRate (filter: BloomFilter, probes: string[]): number {
  let falsePositives = 0
  for (const probe of probes) {
    if (filter.check(probe)) falsePositives++
  }
  return falsePositives / probes.length
}
