// SPDX-License-Identifier: GPL-2.0-or-later
// Entry point: relaxed-kle <layout.json> [--out <path>] [--rows offset|recorded]

import { runCli } from './cli'

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err) => {
    console.error(err)
    process.exit(1)
  })
