import {
  BatchGetCommand,
  BatchWriteCommand,
  QueryCommand,
  ScanCommand,
  UpdateCommand,
  type BatchWriteCommandInput,
  type DynamoDBDocumentClient,
} from "@aws-sdk/lib-dynamodb";

import { chunk } from "@/lib/collections";
import { dynamoDocClient, getTableName } from "@/lib/dynamo";
import type { Library } from "@/lib/library/build-library";
import { toStorageRows } from "@/lib/library/table";
import type { Logger } from "@/lib/logger";
import {
  asNumber,
  asString,
  asStringList,
  normalizeKeyword,
  type RawItem,
} from "@/lib/values";

/**
 * Repository for the three library tables.
 *
 * Photos: `photoName` (HASH). One item per photo with the normalized
 * sidecar fields, `keywords` from the sidecar and `aiKeywords` from the
 * tagger.
 *
 * PhotoKeywords: `keyword` (HASH), `photoName` (RANGE), `source`
 * ("manual" | "ai"), `taggedAt`. Query by keyword to find its photos.
 *
 * KeywordSummaries: `keyword` (HASH), `manualPhotos` (number),
 * `aiPhotos` (string set), `lastTaggedAt`.
 */

export type KeywordSource = "manual" | "ai";

export type StoredPhoto = {
  name: string;
  createDate: string;
  date: string;
  camera: string;
  lens: string;
  focalLength: number;
  fNumber: number;
  flag: number;
  cropFactor: number;
  equivalentFocalLength: string;
  keywords: string[];
  aiKeywords: string[];
  updatedAt?: string;
};

export type KeywordSummary = {
  keyword: string;
  totalPhotos: number;
  manualPhotos: number;
  aiPhotos: number;
  lastTaggedAt?: string;
};

export type StoreOptions = {
  client?: DynamoDBDocumentClient;
  logger?: Logger;
  now?: () => Date;
};

export type SaveLibraryResult = {
  photos: number;
  keywordLinks: number;
  keywords: number;
};

type WriteRequest = NonNullable<BatchWriteCommandInput["RequestItems"]>[string][number];

const BATCH_WRITE_LIMIT = 25;
const BATCH_GET_LIMIT = 100;
const MAX_WRITE_ATTEMPTS = 8;

function mapPhotoItem(item: RawItem): StoredPhoto {
  return {
    name: asString(item.photoName) ?? "",
    createDate: asString(item.createDate) ?? "",
    date: asString(item.date) ?? "",
    camera: asString(item.camera) ?? "",
    lens: asString(item.lens) ?? "",
    focalLength: asNumber(item.focalLength) ?? 0,
    fNumber: asNumber(item.fNumber) ?? 0,
    flag: asNumber(item.flag) ?? 0,
    cropFactor: asNumber(item.cropFactor) ?? 1,
    equivalentFocalLength: asString(item.equivalentFocalLength) ?? "",
    keywords: asStringList(item.keywords),
    aiKeywords: asStringList(item.aiKeywords),
    updatedAt: asString(item.updatedAt),
  };
}

function setSize(value: unknown): number {
  if (value instanceof Set) {
    return value.size;
  }

  return Array.isArray(value) ? value.length : 0;
}

function mapKeywordSummary(item: RawItem): KeywordSummary {
  const manualPhotos = asNumber(item.manualPhotos) ?? 0;
  const aiPhotos = setSize(item.aiPhotos);

  return {
    keyword: asString(item.keyword) ?? "",
    totalPhotos: manualPhotos + aiPhotos,
    manualPhotos,
    aiPhotos,
    lastTaggedAt: asString(item.lastTaggedAt),
  };
}

function comparePhotos(a: StoredPhoto, b: StoredPhoto): number {
  if (a.createDate && b.createDate && a.createDate !== b.createDate) {
    return new Date(b.createDate).getTime() - new Date(a.createDate).getTime();
  }

  return a.name.localeCompare(b.name);
}

async function writeBatch(
  client: DynamoDBDocumentClient,
  tableName: string,
  batch: WriteRequest[],
  logger: Logger,
): Promise<void> {
  let pending = batch;

  for (let attempt = 1; pending.length > 0; attempt += 1) {
    if (attempt > MAX_WRITE_ATTEMPTS) {
      throw new Error(
        `${pending.length} writes to ${tableName} still unprocessed after ${MAX_WRITE_ATTEMPTS} attempts`,
      );
    }

    const response = await client.send(
      new BatchWriteCommand({
        RequestItems: { [tableName]: pending },
      }),
    );

    pending = response.UnprocessedItems?.[tableName] ?? [];
    if (pending.length > 0) {
      logger.warn(`Retrying ${pending.length} unprocessed writes to ${tableName}...`);
    }
  }
}

async function writeAll(
  client: DynamoDBDocumentClient,
  tableName: string,
  requests: WriteRequest[],
  logger: Logger,
): Promise<void> {
  for (const batch of chunk(requests, BATCH_WRITE_LIMIT)) {
    await writeBatch(client, tableName, batch, logger);
  }
}

/**
 * Stores a built library: one Photos item per photo, one PhotoKeywords
 * link per (keyword, photo) and the manual photo count of every keyword.
 * Counts are SET rather than added, so saving the same library twice
 * leaves the tables unchanged apart from timestamps.
 */
export async function saveLibrary(
  library: Pick<Library, "table">,
  options: StoreOptions = {},
): Promise<SaveLibraryResult> {
  const client = options.client ?? dynamoDocClient;
  const logger = options.logger ?? console;
  const now = (options.now ?? (() => new Date()))().toISOString();

  const photosTable = getTableName("photos");
  const linksTable = getTableName("photo-keywords");
  const summariesTable = getTableName("keyword-summaries");

  // photo names repeat when the same file name lives in two folders;
  // the last one read wins
  const rows = new Map(toStorageRows(library.table).map((row) => [row.name, row]));

  const photoWrites: WriteRequest[] = [];
  const links = new Map<string, WriteRequest>();
  const photosPerKeyword = new Map<string, Set<string>>();

  for (const row of rows.values()) {
    const keywords = [...new Set(row.Keywords.map(normalizeKeyword))].filter(
      (keyword) => keyword.length > 0,
    );

    photoWrites.push({
      PutRequest: {
        Item: {
          photoName: row.name,
          createDate: row.CreateDate.toISOString(),
          date: row.Date,
          camera: row.Camera,
          lens: row.Lens,
          focalLength: row.FocalLength,
          fNumber: row.FNumber,
          flag: row.Flag,
          cropFactor: row.CropFactor,
          equivalentFocalLength: row.EqFocalLength,
          keywords,
          updatedAt: now,
        },
      },
    });

    for (const keyword of keywords) {
      links.set(`${keyword}#${row.name}`, {
        PutRequest: {
          Item: {
            keyword,
            photoName: row.name,
            source: "manual" satisfies KeywordSource,
            taggedAt: now,
          },
        },
      });

      const photos = photosPerKeyword.get(keyword) ?? new Set<string>();
      photos.add(row.name);
      photosPerKeyword.set(keyword, photos);
    }
  }

  logger.info(`Writing ${photoWrites.length} photos to ${photosTable}...`);
  await writeAll(client, photosTable, photoWrites, logger);

  logger.info(`Writing ${links.size} keyword links to ${linksTable}...`);
  await writeAll(client, linksTable, [...links.values()], logger);

  for (const [keyword, photos] of photosPerKeyword) {
    await client.send(
      new UpdateCommand({
        TableName: summariesTable,
        Key: { keyword },
        UpdateExpression: "SET manualPhotos = :count, lastTaggedAt = :now",
        ExpressionAttributeValues: {
          ":count": photos.size,
          ":now": now,
        },
      }),
    );
  }

  return {
    photos: photoWrites.length,
    keywordLinks: links.size,
    keywords: photosPerKeyword.size,
  };
}

/**
 * Records labels found by the image tagger for one photo. Each keyword's
 * summary keeps the set of photos tagged with it, so tagging a photo again
 * does not inflate the count.
 */
export async function saveAiTags(
  photoName: string,
  tags: readonly string[],
  options: StoreOptions = {},
): Promise<number> {
  const client = options.client ?? dynamoDocClient;
  const logger = options.logger ?? console;
  const now = (options.now ?? (() => new Date()))().toISOString();

  const keywords = [...new Set(tags.map(normalizeKeyword))].filter(
    (keyword) => keyword.length > 0,
  );

  if (keywords.length === 0) {
    return 0;
  }

  const linksTable = getTableName("photo-keywords");
  const summariesTable = getTableName("keyword-summaries");
  const photosTable = getTableName("photos");

  await writeAll(
    client,
    linksTable,
    keywords.map((keyword) => ({
      PutRequest: {
        Item: {
          keyword,
          photoName,
          source: "ai" satisfies KeywordSource,
          taggedAt: now,
        },
      },
    })),
    logger,
  );

  await client.send(
    new UpdateCommand({
      TableName: photosTable,
      Key: { photoName },
      UpdateExpression: "SET aiKeywords = :keywords, updatedAt = :now",
      ExpressionAttributeValues: {
        ":keywords": keywords,
        ":now": now,
      },
    }),
  );

  for (const keyword of keywords) {
    await client.send(
      new UpdateCommand({
        TableName: summariesTable,
        Key: { keyword },
        UpdateExpression: "SET lastTaggedAt = :now ADD aiPhotos :photo",
        ExpressionAttributeValues: {
          ":now": now,
          ":photo": new Set([photoName]),
        },
      }),
    );
  }

  return keywords.length;
}

async function scanAll(
  client: DynamoDBDocumentClient,
  tableName: string,
): Promise<RawItem[]> {
  const items: RawItem[] = [];
  let exclusiveStartKey: RawItem | undefined;

  do {
    const response = await client.send(
      new ScanCommand({
        TableName: tableName,
        ExclusiveStartKey: exclusiveStartKey,
      }),
    );

    items.push(...(response.Items ?? []));
    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  return items;
}

/** Every stored photo, newest first. */
export async function fetchAllPhotos(
  options: StoreOptions = {},
): Promise<StoredPhoto[]> {
  const client = options.client ?? dynamoDocClient;
  const items = await scanAll(client, getTableName("photos"));

  return items.map(mapPhotoItem).sort(comparePhotos);
}

/** Keywords by photo count, most used first. */
export async function fetchKeywordSummaries(
  options: StoreOptions = {},
): Promise<KeywordSummary[]> {
  const client = options.client ?? dynamoDocClient;
  const items = await scanAll(client, getTableName("keyword-summaries"));

  return items
    .map(mapKeywordSummary)
    .filter((summary) => summary.keyword.length > 0)
    .sort(
      (a, b) =>
        b.totalPhotos - a.totalPhotos || a.keyword.localeCompare(b.keyword),
    );
}

export async function fetchPhotosByKeyword(
  keyword: string,
  options: StoreOptions = {},
): Promise<StoredPhoto[]> {
  const client = options.client ?? dynamoDocClient;
  const normalized = normalizeKeyword(keyword);
  const linksTable = getTableName("photo-keywords");
  const photosTable = getTableName("photos");

  const photoNames: string[] = [];
  let exclusiveStartKey: RawItem | undefined;

  do {
    const response = await client.send(
      new QueryCommand({
        TableName: linksTable,
        KeyConditionExpression: "keyword = :keyword",
        ExpressionAttributeValues: {
          ":keyword": normalized,
        },
        ExclusiveStartKey: exclusiveStartKey,
      }),
    );

    for (const item of response.Items ?? []) {
      const photoName = asString(item.photoName);
      if (photoName && !photoNames.includes(photoName)) {
        photoNames.push(photoName);
      }
    }

    exclusiveStartKey = response.LastEvaluatedKey;
  } while (exclusiveStartKey);

  if (photoNames.length === 0) {
    return [];
  }

  const photos: StoredPhoto[] = [];

  for (const batch of chunk(photoNames, BATCH_GET_LIMIT)) {
    let keys: RawItem[] = batch.map((photoName) => ({ photoName }));

    while (keys.length > 0) {
      const response = await client.send(
        new BatchGetCommand({
          RequestItems: {
            [photosTable]: { Keys: keys },
          },
        }),
      );

      photos.push(...(response.Responses?.[photosTable] ?? []).map(mapPhotoItem));
      keys = response.UnprocessedKeys?.[photosTable]?.Keys ?? [];
    }
  }

  return photos.sort(comparePhotos);
}
