import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import { loadConfig, sourceConfig } from './config.js'
import { createCalDAVSink } from './calendar/caldav-client.js'
import { loadCalendarCredentials } from './calendar/config.js'
import { ScheduleCalendar } from './calendar/bridge.js'
import { SOURCES, findSource } from './sources/index.js'
import type { ScheduleSource, TermOptions, TermSelection } from './sources/types.js'
import { importSchedule, updateSchedule, type SyncRequest } from './sync/schedule-sync.js'
import { MutableOutput, askSecret } from './terminal.js'

async function choose(rl: readline.Interface, label: string, choices: string[]): Promise<string> {
  console.log(`\n${label}:`)
  choices.forEach((choice, i) => console.log(`  ${i + 1}. ${choice}`))

  while (true) {
    const answer = (await rl.question('> ')).trim()
    const index = Number.parseInt(answer, 10) - 1
    const picked = choices[index]
    if (/^\d+$/.test(answer) && picked !== undefined) return picked
    console.log(`Please enter a number between 1 and ${choices.length}.`)
  }
}

async function ask(rl: readline.Interface, prompt: string, fallback = ''): Promise<string> {
  const suffix = fallback ? ` (press Enter for "${fallback}")` : ''
  let answer = ''
  while (!answer) {
    answer = (await rl.question(`${prompt}${suffix}: `)).trim() || fallback
    if (!answer) console.log(`${prompt} is required, please try again.`)
  }
  return answer
}

function termChooser(rl: readline.Interface): (options: TermOptions) => Promise<TermSelection> {
  return async (options) => {
    const selection: TermSelection = {}
    for (const [key, values] of Object.entries(options)) {
      if (values.length === 0) {
        console.log(`No ${key} offered by the portal; using the portal default.`)
        selection[key] = ''
        continue
      }
      selection[key] = await choose(rl, `Choose ${key}`, values)
    }
    return selection
  }
}

async function pickSource(rl: readline.Interface): Promise<ScheduleSource> {
  const name = await choose(
    rl,
    'Choose your school',
    SOURCES.map((source) => source.displayName),
  )
  const source = findSource(name)
  if (!source) {
    throw new Error(`Unknown source: ${name}`)
  }
  return source
}

async function main(): Promise<void> {
  const config = loadConfig()
  const calendarCredentials = loadCalendarCredentials()
  if (!calendarCredentials) {
    console.error('Calendar credentials are required. Add them and run again.')
    process.exit(1)
  }

  const sink = createCalDAVSink(config.calendar.server, calendarCredentials)
  const calendar = new ScheduleCalendar(sink, {
    timeZone: config.timeZone,
    reminderMinutes: config.reminderMinutes,
  })

  const terminalOutput = new MutableOutput(output)
  const rl = readline.createInterface({
    input,
    output: terminalOutput,
    terminal: output.isTTY,
  })
  try {
    const source = await pickSource(rl)
    const action = await choose(rl, 'What do you want to do?', ['Import', 'Update', 'Exit'])
    if (action === 'Exit') return

    const calendarName = await ask(rl, 'Calendar name', config.defaultCalendarName)
    const username = await ask(rl, 'Username')
    let password = ''
    while (!password) {
      password = await askSecret(rl, terminalOutput, 'Password: ')
      if (!password) console.log('Password is required, please try again.')
    }

    const { account, portal } = source.connect(
      { username, password },
      sourceConfig(config, source.id),
    )
    const request: SyncRequest = {
      account,
      portal,
      calendar,
      calendarName,
      chooseTerm: termChooser(rl),
    }

    if (action === 'Import') {
      const outcome = await importSchedule(request)
      if (outcome.status === 'exists') {
        console.log(`Calendar '${outcome.calendarName}' already exists. Use Update instead.`)
      } else {
        console.log(`Imported ${outcome.count} classes into '${outcome.calendarName}'.`)
      }
    } else {
      const outcome = await updateSchedule(request)
      if (outcome.status === 'missing') {
        console.log(`Calendar '${outcome.calendarName}' does not exist. Use Import instead.`)
      } else {
        console.log(`Updated '${outcome.calendarName}' with ${outcome.count} classes.`)
      }
    }
  } finally {
    rl.close()
  }
}

main().catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
})
