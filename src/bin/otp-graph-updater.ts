#!/usr/bin/env node
import { executeUpdateCli, installInterruptHandlers } from "../cli/update";

installInterruptHandlers();
void executeUpdateCli();
