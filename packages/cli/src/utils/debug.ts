/**
 * Whether the DEBUG environment variable asks for debug logging and stack traces.
 */
export function isDebugMode(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.DEBUG === '1' || env.DEBUG === 'true';
}
