import { readFileSync } from "fs";
import { z } from "zod";
import { assetPath } from "../config/assets";
import { errorMessage } from "../errors";
import { Logger } from "../logging/logger";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";
export const DEFAULT_ACCEPT_LANGUAGE = "en-US,en;q=0.9";

const STATIC_HEADERS: Readonly<Record<string, string>> = {
  Accept: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
  "Accept-Language": DEFAULT_ACCEPT_LANGUAGE,
  "Accept-Encoding": "gzip, deflate, br",
  Connection: "keep-alive",
  "Upgrade-Insecure-Requests": "1"
};

const UserAgentPoolSchema = z.array(z.string().min(1)).min(1);

export interface IdentitySource {
  next(): string;
}

/** Picks a random agent from a JSON array on disk, read on first use. */
export class FileIdentitySource implements IdentitySource {
  private pool: string[] | null = null;

  constructor(
    private readonly filePath: string = assetPath("user-agents.json"),
    private readonly random: () => number = Math.random
  ) {}

  next(): string {
    if (!this.pool) {
      const raw: unknown = JSON.parse(readFileSync(this.filePath, "utf8"));
      this.pool = UserAgentPoolSchema.parse(raw);
    }
    const index = Math.min(this.pool.length - 1, Math.floor(this.random() * this.pool.length));
    return this.pool[index];
  }
}

export interface HeaderProviderOptions {
  rotate: boolean;
  source: IdentitySource;
  logger: Logger;
}

export class HeaderProvider {
  private readonly rotate: boolean;
  private readonly source: IdentitySource;
  private readonly logger: Logger;

  constructor(options: HeaderProviderOptions) {
    this.rotate = options.rotate;
    this.source = options.source;
    this.logger = options.logger;
  }

  headers(): Record<string, string> {
    return { "User-Agent": this.userAgent(), ...STATIC_HEADERS };
  }

  private userAgent(): string {
    if (!this.rotate) return DEFAULT_USER_AGENT;
    try {
      return this.source.next();
    } catch (error) {
      this.logger.warn("User agent rotation failed, using default agent", {
        error: errorMessage(error)
      });
      return DEFAULT_USER_AGENT;
    }
  }
}
