#!/usr/bin/env node

import { defineCommand, runMain } from "citty"

import { start } from "./start"

const main = defineCommand({
  meta: {
    name: "graceful-serve",
    description: "HTTP server with graceful shutdown and access logging",
  },
  subCommands: { start },
})

void runMain(main)
