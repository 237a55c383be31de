import type { Rule } from "hookwarden-core";
import { noBashFileWrite } from "./noBashFileWrite.js";
import { noNetworkExfil } from "./noNetworkExfil.js";

export const securityRules: readonly Rule[] = [noBashFileWrite, noNetworkExfil];
