import dotenv from 'dotenv'

/** Load environment variables from a .env file. Existing variables win. */
export function loadEnvFile(envPath?: string): void {
  dotenv.config(envPath ? { path: envPath } : undefined)
}
