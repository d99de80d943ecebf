import pino from 'pino'

const level = process.env.LOG_LEVEL ?? 'info'
const service = process.env.OTEL_SERVICE_NAME ?? 'dbaas-operator'

export const logger = pino({
  level,
  base: {
    service,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
})

export type Logger = typeof logger
