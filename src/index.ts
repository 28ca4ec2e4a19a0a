import 'dotenv/config';
import { createBot } from './bot/bot.js';
import { ChatSessionStore } from './bot/session.js';
import { loadConfig } from './config.js';
import { openReportArchive } from './report/archive.js';
import { createRuntime } from './runtime.js';

async function main() {
  console.log('Lectern starting...');

  const config = loadConfig();
  if (!config.telegramBotToken) {
    throw new Error('TELEGRAM_BOT_TOKEN is required to run the bot');
  }
  console.log(`Model: ${config.defaultModel}`);

  const archive = await openReportArchive({
    reportsDir: config.reportsDir,
    gitCommit: config.reportsGitCommit,
  });
  console.log(`Reports archived at: ${archive.getLocalPath()}`);

  const runtime = createRuntime(config);
  const sessions = new ChatSessionStore();
  const bot = createBot(config.telegramBotToken, { config, runtime, sessions, archive });

  let stopping = false;
  const stopBot = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    console.log(`Received ${signal}, stopping bot...`);
    sessions.cancelAll();
    void bot.stop();
  };

  const onSigint = () => stopBot('SIGINT');
  const onSigterm = () => stopBot('SIGTERM');
  process.once('SIGINT', onSigint);
  process.once('SIGTERM', onSigterm);

  try {
    await bot.start({
      onStart: (botInfo) => {
        console.log(`Bot started as @${botInfo.username}`);
      },
    });
  } finally {
    process.removeListener('SIGINT', onSigint);
    process.removeListener('SIGTERM', onSigterm);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
