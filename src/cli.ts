#!/usr/bin/env node
// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import { main } from "./cli/main.js";

process.exitCode = await main(process.argv.slice(2));
