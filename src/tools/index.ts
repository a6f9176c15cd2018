import type { CapabilityHandler } from "../gateway/descriptor.js";
import { BASE_TOOLS } from "./base-tools.js";
import { DBA_TOOLS } from "./dba-tools.js";

export const BUILTIN_TOOLS: readonly CapabilityHandler[] = [...BASE_TOOLS, ...DBA_TOOLS];
