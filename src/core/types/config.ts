/**
 * Config types, inferred from the zod schema.
 */

import type { z } from "zod";
import type { ConfigSchema } from "../../infrastructure/config/schema.js";

export type Config = z.infer<typeof ConfigSchema>;
