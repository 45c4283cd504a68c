import { DynamoDBClient } from "@aws-sdk/client-dynamodb";
import { DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";

const REGION = process.env.AWS_REGION;

const initClient = new DynamoDBClient({
  region: REGION,
});

// remove undefined values from objects
export const dynamoDocClient = DynamoDBDocumentClient.from(initClient, {
  marshallOptions: {
    removeUndefinedValues: true,
  },
});

export type TableType = "photos" | "photo-keywords" | "keyword-summaries";

export function getTableName(
  tableType: TableType,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const envKey = {
    photos: "DYNAMO_PHOTOS_TABLE",
    "photo-keywords": "DYNAMO_PHOTO_KEYWORDS_TABLE",
    "keyword-summaries": "DYNAMO_KEYWORD_SUMMARIES_TABLE",
  }[tableType];

  const table = env[envKey];

  if (!table) {
    throw new Error(`${envKey} env var is required.`);
  }

  return table;
}
