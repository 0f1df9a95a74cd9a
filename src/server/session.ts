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

// FILE: src/server/session.ts

import type { Redis } from "@upstash/redis"
import z from "zod"
import { BLACK, Board, WHITE, opposite, playerName, type Player } from "@/lib/othello"
import { parseSave } from "@/lib/saveFile"
import { engineSettingsSchema, type EngineSettings } from "./config"
import { gameKey } from "./keys"

export class SessionNotFoundError extends Error {
    constructor(sessionId: string) {
        super(`Game session ${sessionId} does not exist`)
        this.name = "SessionNotFoundError"
    }
}

export class NotYourTurnError extends Error {
    constructor() {
        super("Not your turn")
        this.name = "NotYourTurnError"
    }
}

const player = z.union([z.literal(BLACK), z.literal(WHITE)])

const move = z.object({ x: z.number().int(), y: z.number().int() })

/*
`start` is the grid the game began from and `moves` every play made since, passes by hand
included; passes the engine records on its own are left out and come back on replay.
`save` is the export text handed out by /export.
*/
export const gameSessionSchema = z.object({
    sessionId: z.string().min(1),
    settings: engineSettingsSchema,
    start: z.string(),
    moves: z.array(move),
    save: z.string(),
    resigned: player.nullable(),
    createdAt: z.number(),
    updatedAt: z.number(),
})

export type GameSession = z.infer<typeof gameSessionSchema>

export interface SessionStore {
    load(sessionId: string): Promise<GameSession | null>
    save(session: GameSession): Promise<void>
}

export function redisSessionStore(redis: Redis, ttlSeconds: number): SessionStore {
    return {
        async load(sessionId) {
            const raw = await redis.get<unknown>(gameKey(sessionId))
            if (raw === null) return null
            return gameSessionSchema.parse(raw)
        },
        async save(session) {
            await redis.set(gameKey(session.sessionId), session, { ex: ttlSeconds })
        },
    }
}

export function isAiSide(settings: EngineSettings, side: Player): boolean {
    return settings.aiColor === "both" || settings.aiColor === playerName(side)
}

export function recordGame(session: GameSession, board: Board) {
    session.start = new Board(board.size, board.startPosition()).export()
    session.moves = board
        .getHistory()
        .filter((e) => !e.forced)
        .map(({ x, y }) => ({ x, y }))
    session.save = board.export()
}

export function boardOf(session: GameSession): Board {
    const board = parseSave(session.start)
    for (const m of session.moves) board.play(m.x, m.y)
    if (session.resigned) board.forceGameOver()
    return board
}

export function publicGameState(session: GameSession, board: Board) {
    const over = board.isGameOver()
    const last = board.lastPlay()
    const winner = !over ? null : session.resigned ? opposite(session.resigned) : board.winner()

    return {
        sessionId: session.sessionId,
        size: board.size,
        board: board.rows(),
        status: over ? ("finished" as const) : ("playing" as const),
        turn: over ? null : board.currentPlayer,
        turnNumber: board.turn,
        blackCount: board.count(BLACK),
        whiteCount: board.count(WHITE),
        winner,
        legalMoves: over ? [] : board.legalMoveList(),
        lastMove: last ? { x: last.x, y: last.y, player: last.player } : null,
        settings: session.settings,
        updatedAt: session.updatedAt,
    }
}
