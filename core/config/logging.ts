import winston from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: winston.config.npm.levels,

  colors: winston.config.npm.colors,

  defaultLevel: 'warn',

  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    values: {
      level: 'warn'
    },
    grammar: {
      level: 'warn'
    },
    translator: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    branching: {
      level: 'warn'
    }
  }
} as const;

export type LoggedService = keyof typeof loggingConfig.services;
