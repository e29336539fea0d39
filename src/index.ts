#!/usr/bin/env node
/**
 * fleet-sync CLI entrypoint
 *
 * The CLI handles its own argument parsing.
 */

import './cli.js';
