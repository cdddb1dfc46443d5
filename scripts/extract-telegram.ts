/**
 * Build the corpus file from a Telegram Desktop channel export
 * Run with: npx tsx scripts/extract-telegram.ts <result.json> [output.json]
 *
 * The output path defaults to CORPUS_PATH, or ./data/posts.json.
 */

import 'dotenv/config';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { extractPostTexts } from '../src/corpus/telegramExport.js';

async function main() {
  const [inputPath, outputArg] = process.argv.slice(2);
  if (!inputPath) {
    console.error('Usage: tsx scripts/extract-telegram.ts <result.json> [output.json]');
    process.exit(1);
  }

  const outputPath = outputArg ?? process.env.CORPUS_PATH ?? './data/posts.json';

  console.log(`Reading export: ${inputPath}`);
  const data: unknown = JSON.parse(await readFile(inputPath, 'utf-8'));
  const posts = extractPostTexts(data);
  console.log(`Found ${posts.length} posts (service and empty messages skipped)`);

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, `${JSON.stringify(posts, null, 2)}\n`, 'utf-8');
  console.log(`Corpus saved to ${outputPath}`);

  console.log('\nPreview of first 3 posts:');
  posts.slice(0, 3).forEach((post, i) => {
    console.log(`${i + 1}. ${post.substring(0, 100).replace(/\n/g, ' ')}...`);
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
