const TRUTHY = ['1', 'true', 'yes', 'on'];

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return TRUTHY.includes((env.SKEIN_DEBUG || '').toLowerCase());
}
