import https from "https";
import { z } from "zod";
import { chunk, delay } from "es-toolkit";
import { ApiRequestError, DataFormatError } from "../errors";
import { GearPiece, GuildProfile, PlayerRoster, Unit } from "../models/types";
import { ResponseCache } from "./ResponseCache";
import { normalizeAllyCode } from "./allyCode";
import {
  apiGearResponseSchema,
  apiGuildResponseSchema,
  apiPlayerResponseSchema,
  apiUnitsResponseSchema,
} from "./schemas";
import { mapGear, mapGuild, mapPlayer, mapUnits, parsePayload } from "./mappers";

/**
 * Performs a GET request and returns the decoded JSON body
 */
export type HttpGetter = (url: string, headers: Record<string, string>) => Promise<unknown>;

/**
 * Default getter built on node's https module
 */
export const httpsGetJson: HttpGetter = (url, headers) =>
  new Promise((resolve, reject) => {
    https
      .get(url, { headers }, (res) => {
        let data = "";

        res.setEncoding("utf-8");
        res.on("data", (piece: string) => {
          data += piece;
        });

        res.on("end", () => {
          const status = res.statusCode ?? 0;
          if (status < 200 || status >= 300) {
            reject(new ApiRequestError(url, res.statusMessage ?? "", status));
            return;
          }
          try {
            resolve(JSON.parse(data));
          } catch (err) {
            reject(new DataFormatError(url, `response is not valid JSON (${String(err)})`));
          }
        });
      })
      .on("error", (err) => {
        reject(new ApiRequestError(url, err.message));
      });
  });

export interface SwgohClientOptions {
  apiKey: string;
  baseUrl?: string;
  /** Response cache; omit to always hit the API */
  cache?: ResponseCache;
  /** Transport override (tests) */
  httpGet?: HttpGetter;
  /** Callback for progress updates */
  onProgress?: (message: string) => void;
}

/**
 * How to fetch many guild rosters
 */
export interface RosterFetchOptions {
  /** "parallel" fetches in batches; "sequential" pauses between requests */
  mode?: "parallel" | "sequential";
  /** Batch size in parallel mode */
  concurrency?: number;
  /** Pause between requests in sequential mode */
  delayMs?: number;
}

/**
 * Client for the swgoh.gg API with an optional time-based response cache.
 */
export class SwgohClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly cache: ResponseCache | undefined;
  private readonly httpGet: HttpGetter;
  private readonly onProgress: (message: string) => void;

  constructor(options: SwgohClientOptions) {
    const {
      apiKey,
      baseUrl = "https://swgoh.gg/api",
      cache,
      httpGet = httpsGetJson,
      onProgress = () => {},
    } = options;

    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.headers = { "x-gg-bot-access": apiKey };
    this.cache = cache;
    this.httpGet = httpGet;
    this.onProgress = onProgress;
  }

  /**
   * Fetch a payload through the cache and validate it.
   * Only payloads that pass validation are written to the cache.
   */
  private async fetchValidated<S extends z.ZodTypeAny>(
    cacheKey: string,
    path: string,
    schema: S,
    label: string
  ): Promise<z.output<S>> {
    const url = `${this.baseUrl}/${path}`;

    const cached = await this.cache?.get(cacheKey);
    if (cached !== undefined) {
      const result = schema.safeParse(cached);
      if (result.success) {
        this.onProgress(`Loading ${label} from cache...`);
        return result.data;
      }
      await this.cache?.invalidate(cacheKey);
    }

    this.onProgress(`Fetching ${label} from API...`);
    const payload = await this.httpGet(url, this.headers);
    const parsed = parsePayload(schema, payload, url);
    await this.cache?.set(cacheKey, payload);
    return parsed;
  }

  /**
   * Fetch all unit definitions
   */
  async getUnits(): Promise<Unit[]> {
    const response = await this.fetchValidated("units", "units/", apiUnitsResponseSchema, "units");
    return mapUnits(response);
  }

  /**
   * Fetch all gear pieces with their crafting ingredients
   */
  async getGear(): Promise<GearPiece[]> {
    const response = await this.fetchValidated("gear", "gear/", apiGearResponseSchema, "gear recipes");
    return mapGear(response);
  }

  /**
   * Fetch a player's profile and roster
   */
  async getPlayer(allyCode: string): Promise<PlayerRoster> {
    const code = normalizeAllyCode(allyCode);
    const response = await this.fetchValidated(
      `player_${code}`,
      `player/${code}/`,
      apiPlayerResponseSchema,
      `player ${code}`
    );
    return mapPlayer(response);
  }

  /**
   * Fetch a guild profile with its member list
   */
  async getGuild(guildId: string): Promise<GuildProfile> {
    const response = await this.fetchValidated(
      `guild_${guildId}`,
      `guild-profile/${encodeURIComponent(guildId)}/`,
      apiGuildResponseSchema,
      "guild profile"
    );
    return mapGuild(response);
  }

  /**
   * Look up the guild of the player with the given ally code
   */
  async getGuildFromAllyCode(allyCode: string): Promise<GuildProfile> {
    const player = await this.getPlayer(allyCode);
    if (!player.guildId) {
      throw new DataFormatError(`player ${normalizeAllyCode(allyCode)}`, `${player.name} is not in a guild`);
    }
    return this.getGuild(player.guildId);
  }

  /**
   * Fetch the rosters of many players.
   *
   * Members whose request fails with an HTTP error are reported and skipped;
   * malformed payloads still abort the whole fetch.
   */
  async getGuildRosters(allyCodes: readonly string[], options: RosterFetchOptions = {}): Promise<PlayerRoster[]> {
    const { mode = "parallel", concurrency = 5, delayMs = 1000 } = options;
    const total = allyCodes.length;
    const rosters: PlayerRoster[] = [];
    let done = 0;

    const fetchOne = async (allyCode: string): Promise<PlayerRoster | undefined> => {
      try {
        const roster = await this.getPlayer(allyCode);
        done++;
        this.onProgress(`[${done}/${total}] Loaded ${roster.name}`);
        return roster;
      } catch (error) {
        if (!(error instanceof ApiRequestError)) throw error;
        done++;
        this.onProgress(`[${done}/${total}] Skipped ${allyCode}: ${error.message}`);
        return undefined;
      }
    };

    if (mode === "sequential") {
      for (const [index, allyCode] of allyCodes.entries()) {
        if (index > 0 && delayMs > 0) {
          await delay(delayMs);
        }
        const roster = await fetchOne(allyCode);
        if (roster) rosters.push(roster);
      }
      return rosters;
    }

    for (const batch of chunk([...allyCodes], Math.max(1, concurrency))) {
      const results = await Promise.all(batch.map(fetchOne));
      for (const roster of results) {
        if (roster) rosters.push(roster);
      }
    }
    return rosters;
  }
}
