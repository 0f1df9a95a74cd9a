/* ======================================================= *
Copyright © 2025 suog, Konishi Kento.
All rights reserved.

This work is protected by applicable copyright laws. 

No permission is granted to copy, reproduce, modify, distribute, publish, transmit, sublicense, 
or otherwise exploit this work, in whole or in part, in any form or by any means, 
without the prior explicit written consent of the copyright holder.
Use of this work for training, fine-tuning, evaluating, benchmarking, or otherwise developing or 
improving machine learning systems, including generative or foundation models, is expressly prohibited.
This includes any incorporation of this work or any derivative thereof into datasets or pipelines 
used for automated learning or model development. Any false attribution, misrepresentation of origin,
or removal or alteration of this notice is prohibited and constitutes an infringement of the author's moral rights. 

No license or other rights are granted by implication, estoppel, or otherwise.
All rights not expressly granted are reserved by the author.
 ======================================================= */

// FILE: src/server/config.ts

import z from "zod"
import type { BoardSize } from "@/lib/othello"
import { ALGORITHMS } from "./ai"
import { HEURISTIC_NAMES } from "./heuristics"
import { SESSION_TTL_SECONDS } from "./keys"

export const MAX_DEPTH = 8

const boardSize = z.union([z.literal(6), z.literal(8), z.literal(10), z.literal(12)]) satisfies z.ZodType<BoardSize>

export const engineSettingsSchema = z.object({
    size: boardSize.default(8),
    depth: z.number().int().min(1).max(MAX_DEPTH).default(3),
    algorithm: z.enum(ALGORITHMS).default("alphabeta"),
    heuristic: z.enum(HEURISTIC_NAMES).default("allInOne"),
    aiColor: z.enum(["black", "white", "both", "none"]).default("white"),
})

export type EngineSettings = z.infer<typeof engineSettingsSchema>

const envSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    UPSTASH_REDIS_REST_URL: z.string().url(),
    UPSTASH_REDIS_REST_TOKEN: z.string().min(1),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(SESSION_TTL_SECONDS),
})

export type AppConfig = {
    port: number
    redis: { url: string; token: string }
    sessionTtlSeconds: number
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = envSchema.parse(env)
    return {
        port: parsed.PORT,
        redis: { url: parsed.UPSTASH_REDIS_REST_URL, token: parsed.UPSTASH_REDIS_REST_TOKEN },
        sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
    }
}

export function parseSettings(input: unknown): EngineSettings {
    return engineSettingsSchema.parse(input ?? {})
}
