import type { TaskEngine } from './TaskEngine'
import type { TaskEngineEvents } from './types'

type ConsoleSink = Pick<Console, 'log' | 'warn' | 'error'>

export function formatLogLine(entry: TaskEngineEvents['log']): string {
  const scope = entry.taskId ? `[${entry.stage}:${entry.taskId}]` : `[${entry.stage}]`
  return `${entry.timestamp} ${scope} ${entry.text}`
}

/** Forward engine log events to the console; returns the unsubscribe callback. */
export function attachConsoleLogger(engine: TaskEngine, sink: ConsoleSink = console): () => void {
  return engine.on('log', (entry) => {
    const line = formatLogLine(entry)
    if (entry.level === 'error') {
      sink.error(line)
    } else if (entry.level === 'warn') {
      sink.warn(line)
    } else {
      sink.log(line)
    }
  })
}
