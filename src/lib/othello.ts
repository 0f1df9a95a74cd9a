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

// src/lib/othello.ts

import { Bitboard, DIRECTIONS, columnLetter, type Move } from "./bitboard"
import { CannotUndoError, GameOverError, IllegalBoardSizeError, IllegalMoveError } from "./errors"

export type { Move } from "./bitboard"

export type Disc = 0 | 1 | 2
export type Player = 1 | 2

export const EMPTY = 0 as const
export const BLACK = 1 as const
export const WHITE = 2 as const

export const BOARD_SIZES = [6, 8, 10, 12] as const
export type BoardSize = (typeof BOARD_SIZES)[number]

export const PASS: Readonly<Move> = Object.freeze({ x: -1, y: -1 })

export const GLYPHS: Readonly<Record<Disc, string>> = { 0: "_", 1: "X", 2: "O" }

export type PlayOutcome = "continued" | "passed" | "gameOver"

export type HistoryEntry = {
    black: bigint
    white: bigint
    x: number
    y: number
    player: Player
    /** a pass the engine recorded on its own after the opponent's move */
    forced: boolean
}

export function opposite(c: Player): Player
export function opposite(c: Disc): Disc
export function opposite(c: Disc): Disc {
    if (c === BLACK) return WHITE
    if (c === WHITE) return BLACK
    return EMPTY
}

export const playerName = (p: Player) => (p === BLACK ? "black" : "white")

export const isPass = (m: Move) => m.x === -1 && m.y === -1

export function isBoardSize(n: unknown): n is BoardSize {
    return BOARD_SIZES.some((s) => s === n)
}

export function toBoardSize(n: unknown): BoardSize {
    if (!isBoardSize(n)) throw new IllegalBoardSizeError(n)
    return n
}

export function formatMove(m: Move): string {
    return isPass(m) ? "-1-1" : `${columnLetter(m.x)}${m.y + 1}`
}

export type Position = {
    black: bigint
    white: bigint
    currentPlayer: Player
}

export function openingPosition(size: BoardSize): Position {
    const h = size / 2
    const black = new Bitboard(size)
    const white = new Bitboard(size)
    white.set(h - 1, h - 1, true)
    white.set(h, h, true)
    black.set(h - 1, h, true)
    black.set(h, h - 1, true)
    return { black: black.bits, white: white.bits, currentPlayer: BLACK }
}

/**
 * Othello game state over two bitboards with an undo log.
 *
 * `play` and `pop` are exact inverses, which lets search walk the tree on a
 * single board instead of cloning one per node.
 */
export class Board {
    readonly size: BoardSize
    black: Bitboard
    white: Bitboard
    currentPlayer: Player = BLACK
    forcedGameOver = false
    private history: HistoryEntry[] = []
    private fromOpening: boolean

    constructor(size: BoardSize, position?: Position) {
        this.size = toBoardSize(size)
        this.black = new Bitboard(size)
        this.white = new Bitboard(size)

        if (position) {
            if ((position.black & position.white) !== 0n) {
                throw new RangeError("A cell cannot hold both a black and a white disc")
            }
            this.black.bits = position.black
            this.white.bits = position.white
            this.currentPlayer = position.currentPlayer

            const opening = openingPosition(this.size)
            this.fromOpening =
                position.black === opening.black &&
                position.white === opening.white &&
                position.currentPlayer === opening.currentPlayer
        } else {
            this.setOpening()
            this.fromOpening = true
        }
    }

    private setOpening() {
        const opening = openingPosition(this.size)
        this.black = new Bitboard(this.size, opening.black)
        this.white = new Bitboard(this.size, opening.white)
        this.currentPlayer = opening.currentPlayer
    }

    /** True when the board started from the standard four-disc layout, so its history replays. */
    get startsFromOpening(): boolean {
        return this.fromOpening
    }

    /** The position before the first recorded play. */
    startPosition(): Position {
        const first = this.history[0]
        if (!first) return { black: this.black.bits, white: this.white.bits, currentPlayer: this.currentPlayer }
        return { black: first.black, white: first.white, currentPlayer: first.player }
    }

    get turn(): number {
        return Math.floor(this.history.length / 2) + 1
    }

    inBounds(x: number, y: number): boolean {
        return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < this.size && y >= 0 && y < this.size
    }

    discsOf(player: Player): Bitboard {
        return player === BLACK ? this.black : this.white
    }

    emptyMask(): Bitboard {
        return this.black.or(this.white).xor(new Bitboard(this.size, this.black.fullMask))
    }

    cellAt(x: number, y: number): Disc {
        if (this.black.get(x, y)) return BLACK
        if (this.white.get(x, y)) return WHITE
        return EMPTY
    }

    count(player: Player): number {
        return this.discsOf(player).popcount()
    }

    legalMoves(player: Player = this.currentPlayer): Bitboard {
        const own = this.discsOf(player)
        const opp = this.discsOf(opposite(player))
        const empty = this.emptyMask()
        let moves = new Bitboard(this.size)

        for (const d of DIRECTIONS) {
            let candidates = opp.and(own.shift(d))
            while (!candidates.isEmpty()) {
                const next = candidates.shift(d)
                moves = moves.or(empty.and(next))
                candidates = opp.and(next)
            }
        }

        return moves
    }

    legalMoveList(player: Player = this.currentPlayer): Move[] {
        return this.legalMoves(player).hotBits()
    }

    hasLegalMove(player: Player = this.currentPlayer): boolean {
        return !this.legalMoves(player).isEmpty()
    }

    /**
     * Discs owned by `player` after playing at x:y, the placed disc included.
     * Legality is not checked.
     */
    captureMask(x: number, y: number, player: Player): Bitboard {
        const own = this.discsOf(player)
        const opp = this.discsOf(opposite(player))
        const origin = new Bitboard(this.size)
        origin.set(x, y, true)
        let captured = origin.clone()

        for (const d of DIRECTIONS) {
            let run = new Bitboard(this.size)
            let cursor = origin.shift(d)
            while (!cursor.isEmpty()) {
                if (!cursor.and(opp).isEmpty()) {
                    run = run.or(cursor)
                    cursor = cursor.shift(d)
                    continue
                }
                if (!cursor.and(own).isEmpty()) captured = captured.or(run)
                break
            }
        }

        return captured
    }

    isGameOver(): boolean {
        if (this.forcedGameOver) return true
        return !this.hasLegalMove(this.currentPlayer) && !this.hasLegalMove(opposite(this.currentPlayer))
    }

    forceGameOver(): void {
        this.forcedGameOver = true
    }

    private record(x: number, y: number, player: Player, forced: boolean) {
        this.history.push({ black: this.black.bits, white: this.white.bits, x, y, player, forced })
    }

    play(x: number, y: number): PlayOutcome {
        const mover = this.currentPlayer
        const moves = this.legalMoves(mover)
        if (this.forcedGameOver || (moves.isEmpty() && !this.hasLegalMove(opposite(mover)))) {
            throw new GameOverError()
        }

        if (x === PASS.x && y === PASS.y) {
            if (!moves.isEmpty()) throw new IllegalMoveError(x, y, playerName(mover))
            this.record(x, y, mover, false)
            this.currentPlayer = opposite(mover)
            return "continued"
        }

        if (!this.inBounds(x, y) || !moves.get(x, y)) {
            throw new IllegalMoveError(x, y, playerName(mover))
        }

        const captured = this.captureMask(x, y, mover)
        this.record(x, y, mover, false)

        if (mover === BLACK) {
            this.black = this.black.or(captured)
            this.white = this.white.andNot(captured)
        } else {
            this.white = this.white.or(captured)
            this.black = this.black.andNot(captured)
        }

        const next = opposite(mover)
        this.currentPlayer = next
        if (this.hasLegalMove(next)) return "continued"
        if (!this.hasLegalMove(mover)) return "gameOver"

        this.record(PASS.x, PASS.y, next, true)
        this.currentPlayer = mover
        return "passed"
    }

    /** Undo the last play; a forced pass is undone together with the move that caused it. */
    pop(): HistoryEntry {
        const top = this.history.pop()
        if (!top) throw new CannotUndoError()
        this.restore(top)
        if (!top.forced) return top

        const cause = this.history.pop()
        if (!cause) return top
        this.restore(cause)
        return cause
    }

    private restore(entry: HistoryEntry) {
        this.black = new Bitboard(this.size, entry.black)
        this.white = new Bitboard(this.size, entry.white)
        this.currentPlayer = entry.player
        this.forcedGameOver = false
    }

    restart(): void {
        this.setOpening()
        this.history = []
        this.forcedGameOver = false
        this.fromOpening = true
    }

    getHistory(): readonly HistoryEntry[] {
        return this.history
    }

    lastPlay(): HistoryEntry | null {
        return this.history[this.history.length - 1] ?? null
    }

    winner(): 0 | Player {
        const black = this.count(BLACK)
        const white = this.count(WHITE)
        if (black > white) return BLACK
        if (white > black) return WHITE
        return 0
    }

    clone(): Board {
        const copy = new Board(this.size)
        copy.black = this.black.clone()
        copy.white = this.white.clone()
        copy.currentPlayer = this.currentPlayer
        copy.forcedGameOver = this.forcedGameOver
        copy.fromOpening = this.fromOpening
        copy.history = this.history.map((e) => ({ ...e }))
        return copy
    }

    equals(other: Board): boolean {
        return (
            other.size === this.size &&
            other.black.equals(this.black) &&
            other.white.equals(this.white) &&
            other.currentPlayer === this.currentPlayer
        )
    }

    rows(): Disc[][] {
        const out: Disc[][] = []
        for (let y = 0; y < this.size; y++) {
            const row: Disc[] = []
            for (let x = 0; x < this.size; x++) row.push(this.cellAt(x, y))
            out.push(row)
        }
        return out
    }

    toString(showMoves = false): string {
        const moves = showMoves ? this.legalMoves() : new Bitboard(this.size)
        const header = "   " + Array.from({ length: this.size }, (_, x) => columnLetter(x)).join(" ")
        const lines = this.rows().map((row, y) => {
            const cells = row.map((d, x) => (d === EMPTY && moves.get(x, y) ? "*" : GLYPHS[d]))
            return `${String(y + 1).padStart(2)} ${cells.join(" ")}`
        })
        return [header, ...lines].join("\n")
    }

    exportHistory(): string {
        const lines: string[] = []
        for (let i = 0; i < this.history.length; i += 2) {
            const black = this.history[i]
            const white = this.history[i + 1]
            if (!black) break
            let line = `${i / 2 + 1}. ${GLYPHS[black.player]} ${formatMove(black)}`
            if (white) line += ` ${GLYPHS[white.player]} ${formatMove(white)}`
            lines.push(line)
        }
        return lines.join("\n")
    }

    /** Save-file text: side to move, grid, then the replayable history when there is one. */
    export(): string {
        const grid = this.rows().map((row) => row.map((d) => GLYPHS[d]).join(" "))
        const parts = [GLYPHS[this.currentPlayer], ...grid]
        if (this.fromOpening && this.history.length > 0) parts.push("", this.exportHistory())
        return parts.join("\n") + "\n"
    }
}
