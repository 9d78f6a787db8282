import debug from 'debug';

export const NAMESPACES = {
  server: {
    main: 'avatar:server',
    socket: 'avatar:server:socket'
  },
  services: {
    settings: 'avatar:services:settings',
    expression: 'avatar:services:expression',
    vision: 'avatar:services:vision'
  },
  agents: {
    orchestrator: 'avatar:agents:orchestrator',
    directives: 'avatar:agents:directives'
  },
  avatar: {
    model: 'avatar:model',
    capabilities: 'avatar:model:capabilities',
    motion: 'avatar:model:motion'
  },
  parsing: {
    scanner: 'avatar:parsing:scanner',
    normalizer: 'avatar:parsing:normalizer'
  },
  llm: {
    client: 'avatar:llm:client'
  },
  config: 'avatar:config'
} as const;

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Turn on a comma separated namespace list (same syntax as the DEBUG env var).
 * An explicit DEBUG env var always wins over the config file.
 */
export function enableNamespaces(namespaces: string | undefined): void {
  if (process.env.DEBUG) return;
  if (namespaces && namespaces.trim()) {
    debug.enable(namespaces);
  }
}
