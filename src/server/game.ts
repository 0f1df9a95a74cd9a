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

// FILE: src/server/game.ts

import { Elysia, t } from "elysia"
import { nanoid } from "nanoid"
import { CannotUndoError, GameOverError, IllegalBoardSizeError, IllegalMoveError, ParseError } from "@/lib/errors"
import { Board, PASS } from "@/lib/othello"
import { parseSave } from "@/lib/saveFile"
import { chooseAiMove, resolveStrategy } from "./ai"
import { MAX_DEPTH, parseSettings, type EngineSettings } from "./config"
import {
    NotYourTurnError,
    SessionNotFoundError,
    boardOf,
    isAiSide,
    publicGameState,
    recordGame,
    type GameSession,
    type SessionStore,
} from "./session"

const settingsBody = t.Object({
    size: t.Optional(t.Union([t.Literal(6), t.Literal(8), t.Literal(10), t.Literal(12)])),
    depth: t.Optional(t.Integer({ minimum: 1, maximum: MAX_DEPTH })),
    algorithm: t.Optional(t.Union([t.Literal("minimax"), t.Literal("alphabeta"), t.Literal("random")])),
    heuristic: t.Optional(
        t.Union([t.Literal("cornersCaptured"), t.Literal("coinParity"), t.Literal("mobility"), t.Literal("allInOne")])
    ),
    aiColor: t.Optional(t.Union([t.Literal("black"), t.Literal("white"), t.Literal("both"), t.Literal("none")])),
})

const sessionQuery = t.Object({ sessionId: t.String() })

function sessionIdFromQuery(query: unknown): string | undefined {
    if (typeof query !== "object" || query === null) return undefined
    const sessionId: unknown = Reflect.get(query, "sessionId")
    return typeof sessionId === "string" && sessionId.length > 0 ? sessionId : undefined
}

// plays for the engine for as long as it holds the move
function aiStepLoop(board: Board, settings: EngineSettings) {
    if (settings.aiColor === "none") return

    const strategy = resolveStrategy(settings)
    while (!board.isGameOver() && isAiSide(settings, board.currentPlayer)) {
        const move = chooseAiMove(board, strategy)
        board.play(move.x, move.y)
    }
}

function assertHumanTurn(board: Board, settings: EngineSettings) {
    if (board.isGameOver()) throw new GameOverError()
    if (isAiSide(settings, board.currentPlayer)) throw new NotYourTurnError()
}

export const game = (store: SessionStore) => {
    async function persist(session: GameSession, board: Board) {
        recordGame(session, board)
        session.updatedAt = Date.now()
        await store.save(session)
        return { state: publicGameState(session, board) }
    }

    async function open(board: Board, settings: EngineSettings) {
        const now = Date.now()
        const session: GameSession = {
            sessionId: nanoid(),
            settings,
            start: "",
            moves: [],
            save: "",
            resigned: null,
            createdAt: now,
            updatedAt: now,
        }
        aiStepLoop(board, settings)
        return persist(session, board)
    }

    return new Elysia({ prefix: "/game" })
        .error({
            IllegalMoveError,
            IllegalBoardSizeError,
            ParseError,
            GameOverError,
            CannotUndoError,
            NotYourTurnError,
            SessionNotFoundError,
        })
        .onError(({ code, error, set }) => {
            switch (code) {
                case "IllegalMoveError":
                case "IllegalBoardSizeError":
                case "ParseError":
                    set.status = 400
                    return { error: code, message: error.message }
                case "SessionNotFoundError":
                    set.status = 404
                    return { error: code, message: error.message }
                case "GameOverError":
                case "CannotUndoError":
                case "NotYourTurnError":
                    set.status = 409
                    return { error: code, message: error.message }
            }
        })
        .post(
            "/create",
            async ({ body }) => {
                const settings = parseSettings(body)
                return open(new Board(settings.size), settings)
            },
            { body: settingsBody }
        )
        .post(
            "/import",
            async ({ body }) => {
                const board = parseSave(body.save)
                const settings = parseSettings({ ...body.settings, size: board.size })
                return open(board, settings)
            },
            { body: t.Object({ save: t.String({ maxLength: 20_000 }), settings: t.Optional(settingsBody) }) }
        )
        .derive(async ({ query }) => {
            const sessionId = sessionIdFromQuery(query)
            if (!sessionId) throw new SessionNotFoundError("(missing)")

            const session = await store.load(sessionId)
            if (!session) throw new SessionNotFoundError(sessionId)

            return { session, board: boardOf(session) }
        })
        .get("/state", ({ session, board }) => ({ state: publicGameState(session, board) }), { query: sessionQuery })
        .get(
            "/hint",
            ({ session, board }) => {
                if (board.isGameOver()) return { move: null }
                return { move: chooseAiMove(board, resolveStrategy(session.settings)) }
            },
            { query: sessionQuery }
        )
        .get("/export", ({ session }) => session.save, { query: sessionQuery })
        .post(
            "/move",
            async ({ session, board, body }) => {
                assertHumanTurn(board, session.settings)
                board.play(body.x, body.y)
                aiStepLoop(board, session.settings)
                return persist(session, board)
            },
            {
                query: sessionQuery,
                body: t.Object({
                    x: t.Integer({ minimum: 0, maximum: 11 }),
                    y: t.Integer({ minimum: 0, maximum: 11 }),
                }),
            }
        )
        .post(
            "/pass",
            async ({ session, board }) => {
                assertHumanTurn(board, session.settings)
                board.play(PASS.x, PASS.y)
                aiStepLoop(board, session.settings)
                return persist(session, board)
            },
            { query: sessionQuery }
        )
        .post(
            "/undo",
            async ({ session, board }) => {
                board.pop()
                while (board.getHistory().length > 0 && isAiSide(session.settings, board.currentPlayer)) board.pop()
                // only engine moves were left
                if (isAiSide(session.settings, board.currentPlayer)) throw new CannotUndoError()
                session.resigned = null
                return persist(session, board)
            },
            { query: sessionQuery }
        )
        .post(
            "/restart",
            async ({ session, board }) => {
                board.restart()
                session.resigned = null
                aiStepLoop(board, session.settings)
                return persist(session, board)
            },
            { query: sessionQuery }
        )
        .post(
            "/resign",
            async ({ session, board }) => {
                if (board.isGameOver()) throw new GameOverError()
                // the engine replies before persisting, so the side to move is a human
                session.resigned = board.currentPlayer
                board.forceGameOver()
                return persist(session, board)
            },
            { query: sessionQuery }
        )
}
