import fs from "node:fs";
import path from "node:path";
import { Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { minimatch } from "minimatch";
import { formatTimestamp } from "../core/dates";
import type { WarningSink } from "../core/types";
import { TaigaUserSchema, type TaigaUser } from "./schemas";

export const TOKEN_FILE_GLOB = "taiga_tokens_*.json";

const TokenFileSchema = Type.Object({
  auth_token: Type.String({ minLength: 1 }),
  user_info: TaigaUserSchema,
  created_at: Type.String(),
});

export interface StoredToken {
  file: string;
  authToken: string;
  user: TaigaUser;
  createdAt: string;
}

export class TokenStore {
  constructor(
    private readonly dir: string,
    private readonly onWarning?: WarningSink,
  ) {}

  save(input: { authToken: string; user: TaigaUser; now?: Date }): StoredToken {
    const createdAt = formatTimestamp(input.now ?? new Date());
    const file = path.join(this.dir, `taiga_tokens_${createdAt}.json`);
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(
      file,
      JSON.stringify(
        {
          auth_token: input.authToken,
          user_info: input.user,
          created_at: createdAt,
        },
        null,
        2,
      ),
      { encoding: "utf8", mode: 0o600 },
    );
    return { file, authToken: input.authToken, user: input.user, createdAt };
  }

  private read(file: string): StoredToken | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.onWarning?.(`Ignoring unreadable token file ${file}: ${message}`);
      return null;
    }

    if (!Value.Check(TokenFileSchema, parsed)) {
      this.onWarning?.(`Ignoring malformed token file ${file}`);
      return null;
    }

    return {
      file,
      authToken: parsed.auth_token,
      user: parsed.user_info,
      createdAt: parsed.created_at,
    };
  }

  /** Newest readable token file by modification time. */
  loadLatest(): StoredToken | null {
    if (!fs.existsSync(this.dir)) {
      return null;
    }

    const files = fs
      .readdirSync(this.dir)
      .filter((entry) => minimatch(entry, TOKEN_FILE_GLOB))
      .map((entry) => {
        const file = path.join(this.dir, entry);
        return { file, mtimeMs: fs.statSync(file).mtimeMs };
      })
      .sort((a, b) => b.mtimeMs - a.mtimeMs || b.file.localeCompare(a.file));

    for (const { file } of files) {
      const token = this.read(file);
      if (token) {
        return token;
      }
    }
    return null;
  }
}
