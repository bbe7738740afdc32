#!/usr/bin/env node

import { run } from './cli';

run(process.argv.slice(2))
  .then(status => {
    process.exitCode = status;
  })
  .catch(error => {
    console.error(error);
    process.exitCode = 1;
  });
