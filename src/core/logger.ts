const PREFIX = '[ip-sonar]'

export const logger = {
  warn(message: string, ...args: unknown[]): void {
    console.warn(PREFIX, message, ...args)
  },
}
