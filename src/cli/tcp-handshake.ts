#!/usr/bin/env node
import { runHandshakeCli } from '../verifier/cli';

runHandshakeCli(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch(err => {
    console.error(err);
    process.exit(1);
  });
