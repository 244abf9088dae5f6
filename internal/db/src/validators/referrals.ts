import { createSelectSchema } from "drizzle-zod"
import type { z } from "zod"

import * as schema from "../schema"

export const referralSelectSchema = createSelectSchema(schema.referrals)

export type Referral = z.infer<typeof referralSelectSchema>
