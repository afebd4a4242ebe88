import path from 'node:path';
import { UsageError } from './errors.js';
import type { CollectionKind } from './types/catalogue.js';

export const GAME_TYPES = ['D2E', 'MoM'] as const;
export type GameType = (typeof GAME_TYPES)[number];

export const PACKAGE_EXTENSIONS: Record<CollectionKind, string> = {
  scenarios: '.valkyrie',
  'content-packs': '.pak',
};

export interface BatchTarget {
  kind: CollectionKind;
  cataloguePath: string;
  outputPath: string;
  fileExtension: string;
  /** Optional catalogues are skipped when the file does not exist */
  required: boolean;
}

export const USAGE = `Usage: manifest-sync <${GAME_TYPES.join('|')}>`;

function isGameType(value: string): value is GameType {
  return (GAME_TYPES as readonly string[]).includes(value);
}

export function parseGameType(argv: readonly string[]): GameType {
  const selector = argv[0]?.trim();
  if (!selector) throw new UsageError(USAGE);
  if (!isGameType(selector)) {
    throw new UsageError(`Unknown game type "${selector}". ${USAGE}`);
  }
  return selector;
}

/** Scenario and content-pack catalogues of a game, with their manifest outputs. */
export function batchesFor(game: GameType, root: string): BatchTarget[] {
  const dir = path.join(root, game);
  return [
    {
      kind: 'scenarios',
      cataloguePath: path.join(dir, 'manifest.ini'),
      outputPath: path.join(dir, 'manifestDownload.ini'),
      fileExtension: PACKAGE_EXTENSIONS.scenarios,
      required: true,
    },
    {
      kind: 'content-packs',
      cataloguePath: path.join(dir, 'contentPacksManifest.ini'),
      outputPath: path.join(dir, 'contentPacksManifestDownload.ini'),
      fileExtension: PACKAGE_EXTENSIONS['content-packs'],
      required: false,
    },
  ];
}
