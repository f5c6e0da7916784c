const LOCALHOST_IPS = new Set(['127.0.0.1', '::1', 'localhost'])

export function isLocalhostIP(host: string): boolean {
  return LOCALHOST_IPS.has(host) || host.startsWith('127.')
}
