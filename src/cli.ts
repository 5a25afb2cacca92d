#!/usr/bin/env node
import 'reflect-metadata';
import { config as dotenvConfig } from 'dotenv';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { createWinstonLogger } from './config/logger.config';
import { CatalogSeeder } from './catalog/catalog.seeder';
import { ShowsService } from './shows/shows.service';
import {
  CATALOG_USAGE,
  CatalogCommand,
  CommandLineError,
  formatAvailabilityTable,
  formatCounts,
  formatVerification,
  parseCatalogCommand,
} from './catalog/catalog.cli';
import { toIsoDate } from './common/utils/time.util';

dotenvConfig();

function print(lines: string[]): void {
  process.stdout.write(`${lines.join('\n')}\n`);
}

async function run(command: CatalogCommand): Promise<boolean> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: createWinstonLogger(process.env.NODE_ENV, process.env.LOG_LEVEL ?? 'warn'),
  });

  try {
    const seeder = app.get(CatalogSeeder);

    switch (command.name) {
      case 'setup':
        print(formatCounts(await seeder.setup(command.baseDate)));
        return true;
      case 'verify': {
        const result = await seeder.verify();
        print(formatVerification(result));
        return result.passed;
      }
      case 'availability': {
        const date = command.date ?? toIsoDate();
        print([`Shows at "${command.theater}" on ${date}:`]);
        print(formatAvailabilityTable(await app.get(ShowsService).findShowsByTheaterAndDate(command.theater, date)));
        return true;
      }
      case 'teardown':
        print(formatCounts(await seeder.teardown()).map((line) => `removed ${line}`));
        return true;
    }
  } finally {
    await app.close();
  }
}

async function main(): Promise<void> {
  let command: CatalogCommand;
  try {
    command = parseCatalogCommand(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CommandLineError) {
      process.stderr.write(`${error.message}\n\n${CATALOG_USAGE}\n`);
      process.exitCode = 2;
      return;
    }
    throw error;
  }

  const ok = await run(command);
  process.exitCode = ok ? 0 : 1;
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
  process.exitCode = 1;
});
