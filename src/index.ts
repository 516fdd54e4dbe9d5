import 'dotenv/config';
import { startBot } from './bot.js';
import { createPipeline } from './app.js';
import { CONFIG_DIR, LOG_PREFIX, applyConfigFile, loadConfig, type AppConfig } from './config.js';
import { ConfigError } from './errors.js';

function readConfig(): AppConfig {
  applyConfigFile();
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = readConfig();

  if (!config.telegramToken) {
    console.error('Error: Missing required environment variable TELEGRAM_BOT_TOKEN (Telegram bot token from @BotFather).');
    console.error(`Set it in your .env file or environment, or in ~/${CONFIG_DIR}/config.json.`);
    process.exit(1);
  }

  console.log(`[${LOG_PREFIX}] starting... workspace=${config.workspacePath} state=${config.stateDir}`);
  const pipeline = await createPipeline(config);
  console.log(`[${LOG_PREFIX}] workspace ready`);

  const health = await pipeline.healthCheck();
  if (health.healthy) {
    console.log(`[${LOG_PREFIX}] agent ${config.agentCommand} ${health.message} (${health.latencyMs}ms)`);
  } else {
    console.warn(`[${LOG_PREFIX}] agent ${config.agentCommand} is not usable yet: ${health.message}`);
  }

  await startBot(config.telegramToken, pipeline, { allowedCallers: config.allowedCallers });
}

main().catch((err) => {
  console.error(`[${LOG_PREFIX}] fatal error:`, err);
  process.exit(1);
});
