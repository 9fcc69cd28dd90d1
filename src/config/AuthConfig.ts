/**
 * HTTP Basic authentication settings, taken from AUTH_USERNAME / AUTH_PASSWORD.
 * Authentication is enabled only when both are set.
 */

export interface AuthConfig {
  required: boolean;
  username: string;
  password: string;
}

export function authConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AuthConfig {
  const username = env['AUTH_USERNAME'];
  const password = env['AUTH_PASSWORD'];

  if (username !== undefined && password !== undefined) {
    return { required: true, username, password };
  }
  return { required: false, username: '', password: '' };
}
