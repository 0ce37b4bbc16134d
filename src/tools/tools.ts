/**
 * tools.ts — createTools() factory for the Marvel catalog MCP tools.
 *
 * createTools(client) is called once per MCP session; the McpServer instance
 * is created inside this factory and returned for transport wiring.
 *
 * Tool pattern:
 *   1. Parse and validate inputs with zod (inputSchema shape)
 *   2. Call the appropriate MarvelClient method
 *   3. Return toolSuccess(result) or classifyError(error)
 *
 * Retries happen inside MarvelClient, so a tool error marked retryable has
 * already exhausted the client's own retry budget.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { MarvelClient } from '../client/MarvelClient.js';
import type { PaginatedResult } from '../client/paginate.js';
import { imageUrl, type Character, type Comic } from '../client/schemas/index.js';
import { classifyError, toolSuccess } from './errors.js';

const RESOURCE_TYPES = ['characters', 'comics', 'creators', 'events', 'series', 'stories'] as const;

// ---------------------------------------------------------------------------
// Response shaping
// ---------------------------------------------------------------------------

export function summarizeCharacter(character: Character) {
  return {
    id: character.id,
    name: character.name,
    description: character.description,
    modified: character.modified ?? null,
    thumbnail_url: character.thumbnail ? imageUrl(character.thumbnail) : null,
    comics_available: character.comics?.available ?? 0,
    series_available: character.series?.available ?? 0,
    events_available: character.events?.available ?? 0,
    urls: character.urls.map((u) => ({ type: u.type, url: u.url })),
  };
}

export function summarizeComic(comic: Comic) {
  const onsale = comic.dates.find((d) => d.type === 'onsaleDate');
  return {
    id: comic.id,
    title: comic.title,
    issue_number: comic.issueNumber ?? null,
    description: comic.description,
    format: comic.format ?? null,
    page_count: comic.pageCount ?? null,
    onsale_date: onsale?.date ?? null,
    series: comic.series?.name ?? null,
    thumbnail_url: comic.thumbnail ? imageUrl(comic.thumbnail) : null,
    creators: (comic.creators?.items ?? []).map((c) => ({ name: c.name, role: c.role ?? null })),
    characters: (comic.characters?.items ?? []).map((c) => c.name),
  };
}

function mapPage<T, U>(page: PaginatedResult<T>, fn: (item: T) => U): PaginatedResult<U> {
  return { ...page, items: page.items.map(fn) };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createTools(client: MarvelClient): McpServer {
  const server = new McpServer({
    name: 'marvel-catalog-mcp',
    version: '1.0.0',
  });

  // -------------------------------------------------------------------------
  // get_character
  // -------------------------------------------------------------------------
  server.registerTool(
    'get_character',
    {
      description: 'Get a single Marvel character by ID. Returns name, description, thumbnail URL and how many comics, series and events feature the character.',
      inputSchema: {
        character_id: z.number().int().positive().describe('The Marvel character ID, e.g. from search_characters'),
      },
    },
    async ({ character_id }) => {
      try {
        const character = await client.getCharacter(character_id);
        return toolSuccess(summarizeCharacter(character));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // search_characters
  // -------------------------------------------------------------------------
  server.registerTool(
    'search_characters',
    {
      description: 'Search Marvel characters whose name starts with the given text. Returns up to `limit` characters with IDs to use in get_character and list_related.',
      inputSchema: {
        query: z.string().min(1).describe('Beginning of the character name, e.g. "Spider"'),
        limit: z.number().int().min(1).max(100).optional().default(20).describe('Maximum number of results (1-100)'),
        offset: z.number().int().min(0).optional().default(0).describe('Pagination offset; use next_offset from a previous call'),
      },
    },
    async ({ query, limit, offset }) => {
      try {
        const page = await client.listCharacters({ nameStartsWith: query, limit, offset });
        return toolSuccess(mapPage(page, summarizeCharacter));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // get_comic
  // -------------------------------------------------------------------------
  server.registerTool(
    'get_comic',
    {
      description: 'Get a single Marvel comic by ID. Returns title, issue number, on-sale date, creators and characters.',
      inputSchema: {
        comic_id: z.number().int().positive().describe('The Marvel comic ID'),
      },
    },
    async ({ comic_id }) => {
      try {
        const comic = await client.getComic(comic_id);
        return toolSuccess(summarizeComic(comic));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // list_comics
  // -------------------------------------------------------------------------
  server.registerTool(
    'list_comics',
    {
      description: 'List Marvel comics, optionally filtered by title prefix, start year or format. Results are paginated; check has_more and next_offset.',
      inputSchema: {
        title_starts_with: z.string().min(1).optional().describe('Beginning of the comic title'),
        start_year: z.number().int().min(1939).optional().describe('Year the series started'),
        format: z.string().optional().describe('Comic format, e.g. "comic", "trade paperback", "hardcover"'),
        no_variants: z.boolean().optional().describe('Exclude variant covers'),
        limit: z.number().int().min(1).max(100).optional().default(20).describe('Maximum number of results (1-100)'),
        offset: z.number().int().min(0).optional().default(0).describe('Pagination offset'),
      },
    },
    async ({ title_starts_with, start_year, format, no_variants, limit, offset }) => {
      try {
        const page = await client.listComics({
          titleStartsWith: title_starts_with,
          startYear: start_year,
          format,
          noVariants: no_variants,
          limit,
          offset,
        });
        return toolSuccess(mapPage(page, summarizeComic));
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  // -------------------------------------------------------------------------
  // list_related
  // -------------------------------------------------------------------------
  server.registerTool(
    'list_related',
    {
      description: 'List resources related to a Marvel entity, e.g. the comics a character appears in (resource=characters, related=comics) or the characters in an event. Returns raw Marvel records.',
      inputSchema: {
        resource: z.enum(RESOURCE_TYPES).describe('Type of the entity whose relations to list'),
        id: z.number().int().positive().describe('ID of the entity'),
        related: z.enum(RESOURCE_TYPES).describe('Type of the related resources to list'),
        limit: z.number().int().min(1).max(100).optional().default(20).describe('Maximum number of results (1-100)'),
        offset: z.number().int().min(0).optional().default(0).describe('Pagination offset'),
      },
    },
    async ({ resource, id, related, limit, offset }) => {
      try {
        const page = await client.listRelated(resource, id, related, { limit, offset }, z.unknown());
        return toolSuccess(page);
      } catch (error) {
        return classifyError(error);
      }
    },
  );

  return server;
}
