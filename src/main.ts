#!/usr/bin/env node
/**
 * @license
 * Copyright (c) 2025, Internal Implementation
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import { run } from './cli.js';

process.exitCode = await run(process.argv);
