/**
 * schemas/index.ts — Re-exports all Marvel response schemas and TypeScript types.
 */

export { dataWrapperSchema, DataWrapperSchema, DataContainerSchema } from './envelope.js';
export type { DataWrapper, DataContainer } from './envelope.js';

export {
  ImageSchema,
  UrlSchema,
  TextObjectSchema,
  DateSchema,
  PriceSchema,
  SummarySchema,
  SummaryListSchema,
  resourceListSchema,
  imageUrl,
} from './common.js';
export type { Image, Summary, SummaryList } from './common.js';

export { CharacterSchema } from './character.js';
export type { Character } from './character.js';

export { ComicSchema } from './comic.js';
export type { Comic } from './comic.js';
