// src/main.ts
import 'reflect-metadata'; // 必须在最顶部导入，用于装饰器支持
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { parseCliArgs, runPlanCommand } from './cli';
import {
  CatalogLoaderService,
  ItineraryPlannerService,
  WeatherReplannerService,
} from './itinerary-planning';

const logger = new Logger('PlanCli');

async function bootstrap() {
  const args = parseCliArgs(process.argv.slice(2));

  // 不启动 HTTP 服务，只创建应用上下文
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    const lines = await runPlanCommand(args, {
      loader: app.get(CatalogLoaderService),
      planner: app.get(ItineraryPlannerService),
      replanner: app.get(WeatherReplannerService),
    });

    for (const line of lines) {
      console.log(line);
    }
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  bootstrap().catch(error => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
