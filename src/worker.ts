#!/usr/bin/env node
import { env, resolveMailSettings, type Env } from './config/env.js'
import { createStore } from './db/store.js'
import { ReminderTimer } from './lib/scheduler.js'
import { Notifier } from './services/email.js'
import { createTransport } from './services/transport.js'
import { runCampaign } from './jobs/campaign.js'
import { parseWorkerCommand, USAGE } from './jobs/commands.js'
import { recoverReminders, type CampaignContext } from './jobs/reminders/index.js'
import { formatWeeklySchedule, scheduleWeekly } from './jobs/weekly.js'
import { logger } from './utils/logger.js'

function buildContext(config: Env): CampaignContext {
  // Throws ConfigError when sender or transport settings are missing
  const mail = resolveMailSettings(config)

  return {
    store: createStore(config),
    notifier: new Notifier({
      transport: createTransport(mail.transport),
      sender: mail.sender,
      templatePath: config.TEMPLATE_FILE,
    }),
    timer: new ReminderTimer(),
    settings: {
      maxReminders: config.MAX_REMINDERS,
      sendDelayMs: config.SEND_DELAY_MS,
    },
  }
}

function waitForSignal(): Promise<NodeJS.Signals> {
  return new Promise(resolve => {
    process.once('SIGINT', () => resolve('SIGINT'))
    process.once('SIGTERM', () => resolve('SIGTERM'))
  })
}

async function main(): Promise<void> {
  const parsed = parseWorkerCommand(process.argv.slice(2), env.REMINDER_INTERVAL_MINUTES)
  if (!parsed.ok) {
    console.error(`❌ ${parsed.error}\n`)
    console.error(USAGE)
    process.exit(1)
  }

  const { command } = parsed
  const ctx = buildContext(env)
  const signal = waitForSignal()

  console.log('🚀 Starting campaign worker...')

  // Contacts without a stored interval keep the configured default
  await recoverReminders(ctx, env.REMINDER_INTERVAL_MINUTES)

  if (command.kind === 'now') {
    // Recovered jobs only arm once the run is done, so no reminder fires mid-campaign
    const result = await runCampaign(ctx, command.intervalMinutes)
    ctx.timer.start()
    console.log(`✅ Campaign sent: ${result.succeeded}/${result.total} succeeded, ${result.failed} failed`)

    // Stay up while reminder chains are running
    const reason = await Promise.race([ctx.timer.whenIdle().then(() => 'idle'), signal])
    if (reason !== 'idle') console.log(`\n⏳ Received ${reason}, stopping reminders...`)
  } else {
    ctx.timer.start()
    scheduleWeekly(ctx.timer, command.schedule, () => runCampaign(ctx, command.intervalMinutes))
    console.log(`✅ Campaign scheduled ${formatWeeklySchedule(command.schedule)}`)

    const received = await signal
    console.log(`\n⏳ Received ${received}, stopping scheduler...`)
  }

  await ctx.timer.shutdown()
  console.log('👋 Worker stopped')
  process.exit(0)
}

main().catch((err) => {
  logger.error('Worker failed', err)
  process.exit(1)
})
