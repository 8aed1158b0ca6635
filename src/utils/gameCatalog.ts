/**
 * 游戏目录
 * 读取 JSON 目录并转换成首页需要的 GameData
 */

import { z } from 'zod';
import type { GameData, GameMetadata } from '../types/launcher';

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogError';
  }
}

// 图片来源：文件路径或 base64
export const ImageSourceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('path'), path: z.string() }),
  z.object({ kind: z.literal('base64'), data: z.string() }),
]);

const StringListSchema = z.array(z.string()).default([]);

export const GameMetadataSchema = z.object({
  title: z.string().min(1),
  uuid: z.string().min(1),
  description: z.string().optional(),
  genres: z.array(z.string().transform(genre => genre.toLowerCase())).default([]),
  releaseDate: z.string().optional(),
  developers: StringListSchema,
  publishers: StringListSchema,
  platform: z.string().optional(),
  links: StringListSchema,
  tags: StringListSchema,
  coverArt: ImageSourceSchema.optional(),
  backgroundArt: ImageSourceSchema.optional(),
  playtimeMinutes: z.number().finite().nonnegative().optional(),
  favorite: z.boolean().default(false),
  installSource: z.string().optional(),
  launchOptions: StringListSchema,
});

/**
 * 校验一条目录记录
 * 错误信息带上记录下标和字段路径
 */
export function parseGameMetadata(raw: unknown, index: number): GameMetadata {
  const result = GameMetadataSchema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  throw new CatalogError(`entry ${index}: ${field}${issue?.message ?? 'invalid entry'}`);
}

/**
 * 校验整个目录
 */
export function parseCatalog(raw: unknown): GameMetadata[] {
  if (!Array.isArray(raw)) {
    throw new CatalogError('catalog must be a list of games');
  }
  return raw.map((entry, index) => parseGameMetadata(entry, index));
}

export const toGameData = (metadata: GameMetadata): GameData => ({
  title: metadata.title,
  uuid: metadata.uuid,
});

/**
 * 记录一次启动，最近的排在最前
 */
export function recordRecentlyPlayed(recent: readonly string[], uuid: string, limit = 20): string[] {
  return [uuid, ...recent.filter(id => id !== uuid)].slice(0, limit);
}

/**
 * 按最近游玩顺序取出目录中的游戏，已不在目录中的跳过
 */
export function selectRecentGames(catalog: readonly GameMetadata[], recent: readonly string[]): GameMetadata[] {
  const byUuid = new Map(catalog.map(game => [game.uuid, game]));
  return recent.flatMap(uuid => {
    const game = byUuid.get(uuid);
    return game ? [game] : [];
  });
}
