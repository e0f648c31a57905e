/* eslint-disable no-console */
import { readFileSync } from "fs";
import { basename } from "path";
import dotenv from "dotenv";
import prompts from "prompts";
import { createLogger, normalizeError } from "@receipt-pipeline/logging";
import { isErr } from "@receipt-pipeline/types";
import { toResponseDto } from "../application/dto/ProcessReceipt.dto.js";
import { loadPipelineConfig } from "../config/PipelineConfig.js";
import { DocumentLocation } from "../domain/value-objects/DocumentLocation.value-object.js";
import { S3Client } from "../infrastructure/clients/S3Client.js";
import { ReceiptPipelineFactory } from "../infrastructure/factories/ReceiptPipelineFactory.js";
import { ensureReceiptExists } from "./receipt-source.js";
import {
  SUPPORTED_EXTENSIONS,
  contentTypeFor,
  defaultUploadKey,
  isSupportedFile,
  parseCliArgs,
} from "./args.js";

dotenv.config();

const logger = createLogger({ service: "receipt-processing" }).child({
  module: "CLI-ProcessReceipt",
});

function fail(message: string): never {
  console.log(`\n❌ ${message}\n`);
  process.exit(1);
}

async function promptFor(name: string, message: string): Promise<string> {
  const response = await prompts({
    type: "text",
    name,
    message,
    validate: (value: string) => (value ? true : `${name} is required`),
  });

  const value: unknown = response[name];
  if (typeof value !== "string" || value.length === 0) {
    fail(`${name} is required`);
  }
  return value;
}

async function main(): Promise<void> {
  try {
    console.log("\n🧾 Receipt Pipeline CLI\n");

    const args = parseCliArgs(process.argv.slice(2));

    const configResult = loadPipelineConfig();
    if (isErr(configResult)) {
      fail(configResult.error.message);
    }
    const config = configResult.value;
    const storage = new S3Client(config.region);

    const bucket =
      args.bucket || (await promptFor("bucket", "S3 bucket of the receipt:"));

    let key = args.key;

    if (args.file) {
      if (!isSupportedFile(args.file)) {
        fail(
          `Unsupported file type: ${args.file}\nSupported types: ${SUPPORTED_EXTENSIONS.join(", ")}`,
        );
      }

      let content: Buffer;
      try {
        content = readFileSync(args.file);
      } catch (error) {
        const { message } = normalizeError(error);
        fail(`Failed to read file: ${message}`);
      }

      key = key || defaultUploadKey(basename(args.file));
      const uploadLocation = DocumentLocation.create({ bucket, key });
      if (isErr(uploadLocation)) {
        fail(uploadLocation.error.message);
      }

      console.log(`📤 Uploading ${args.file} to ${uploadLocation.value.toUri()}`);

      const uploadResult = await storage.upload(
        uploadLocation.value,
        content,
        contentTypeFor(args.file),
      );
      if (isErr(uploadResult)) {
        fail(uploadResult.error.message);
      }
    }

    if (!key) {
      key = await promptFor("key", "S3 object key of the receipt:");
    }

    if (!args.file) {
      const sourceLocation = DocumentLocation.create({ bucket, key });
      if (isErr(sourceLocation)) {
        fail(sourceLocation.error.message);
      }
      const source = await ensureReceiptExists(storage, sourceLocation.value);
      if (isErr(source)) {
        fail(source.error.message);
      }
    }

    console.log(`\n🚀 Processing s3://${bucket}/${key}\n`);

    const useCase = ReceiptPipelineFactory.create(config);
    const result = await useCase.execute({ bucket, key });

    if (isErr(result)) {
      fail(`Processing failed (${result.error.code}): ${result.error.message}`);
    }

    console.log(JSON.stringify(toResponseDto(result.value), null, 2));

    const { notification } = result.value;
    if (notification.status === "sent") {
      console.log(`\n✉️  Notification sent (${notification.messageId})\n`);
    } else {
      console.log(
        `\n⚠️  Notification failed: ${notification.error.message}\n`,
      );
    }
  } catch (error) {
    const { error: normalizedError, message } = normalizeError(error);
    logger.error("CLI execution failed", normalizedError);
    fail(`Error: ${message}`);
  }
}

void main();
