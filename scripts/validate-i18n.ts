#!/usr/bin/env node
/**
 * Pre-commit / CI entry point.
 *
 * Usage: validate-i18n [--translation-dirs=locales/] <files...>
 * Example: validate-i18n --translation-dirs=public/i18n/ public/i18n/en/common.json
 */

import { loadDotenv } from '../src/config.js';
import { main } from '../src/cli.js';

loadDotenv();

main(process.argv.slice(2))
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((err) => {
        console.error(err);
        process.exit(1);
    });
