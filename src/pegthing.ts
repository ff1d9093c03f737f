#!/usr/bin/env node
import { PegThing } from './pegthing/games/peg/peg'
import { PegApp, streamPrompter } from './pegthing/games/peg/pegapp'

async function run (): Promise<void> {
  const factory = new PegThing()
  const conf = factory.config()
  const rows = Number.parseInt(process.env.PEG_ROWS ?? '', 10)
  if (Number.isInteger(rows) && rows >= 1 && rows <= conf.maxRows) {
    conf.rows = rows
  }
  await new PegApp(factory, conf, streamPrompter()).run()
}

run().then(() => {
}).catch(err => {
  console.error(err)
  process.exitCode = 1
})
