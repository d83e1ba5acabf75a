import { existsSync } from "node:fs";
import { homedir, hostname, userInfo } from "node:os";

/**
 * Local machine identity used for default naming and key discovery.
 */
export interface EnvironmentProbe {
  /** Login of the invoking user; undefined for non-login shells */
  login(): string | undefined;
  hostname(): string;
  homeDir(): string;
  fileExists(path: string): boolean;
}

export class OsEnvironmentProbe implements EnvironmentProbe {
  login(): string | undefined {
    const fromEnv = process.env.LOGNAME ?? process.env.USER;
    if (fromEnv) return fromEnv;
    try {
      return userInfo().username || undefined;
    } catch {
      // userInfo() throws when the uid has no passwd entry
      return undefined;
    }
  }

  hostname(): string {
    return hostname();
  }

  homeDir(): string {
    return homedir();
  }

  fileExists(path: string): boolean {
    return existsSync(path);
  }
}
