import { z } from "zod"

/** `GET /v1/<path>`; `data` is absent when the path holds nothing. */
export const secretResponseSchema = z.object({
  data: z.record(z.string(), z.unknown()).optional(),
})

/** `POST /v1/auth/userpass/login/<username>` */
export const loginResponseSchema = z.object({
  auth: z.object({
    client_token: z.string().min(1),
  }),
})
