#!/usr/bin/env node
import { runDaemon } from "../daemon.js";

process.exit(await runDaemon());
