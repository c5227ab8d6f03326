#!/usr/bin/env node
import process from "node:process";

import { buildCli } from "./cli/commands";
import { reportFailure } from "./cli/reportFailure";

buildCli().parseAsync(process.argv).catch(reportFailure);
