#!/usr/bin/env node
"use strict";

import { runCli } from "../cli.js";

void runCli(process.argv.slice(2))
  .then(exitCode => {
    process.exitCode = exitCode;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
