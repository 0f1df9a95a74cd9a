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

// FILE: src/lib/saveFile.ts

import { IllegalMoveError, GameOverError, ParseError } from "./errors"
import { BLACK, Board, GLYPHS, PASS, WHITE, isBoardSize, type Move, type Player } from "./othello"

type Line = { text: string; line: number }

const HISTORY_LINE = /^(\d+)\.\s+X\s+(\S+)(?:\s+O\s+(\S+))?$/
const MOVE_TOKEN = /^([a-z])(\d+)$/

// comments run from "#" to the end of the line; blank lines carry nothing
function meaningfulLines(raw: string): Line[] {
    const out: Line[] = []
    raw.split(/\r?\n/).forEach((l, i) => {
        const hash = l.indexOf("#")
        const text = (hash === -1 ? l : l.slice(0, hash)).trim()
        if (text.length > 0) out.push({ text, line: i + 1 })
    })
    return out
}

function parseColor(l: Line | undefined): Player {
    if (!l) throw new ParseError("trying to parse an empty board", 1)
    if (l.text === GLYPHS[BLACK]) return BLACK
    if (l.text === GLYPHS[WHITE]) return WHITE
    throw new ParseError(`expected to find the color to play (X or O), found "${l.text}"`, l.line)
}

function rowTokens(l: Line): string[] {
    const tokens = l.text.split(/\s+/)
    for (const t of tokens) {
        if (t !== GLYPHS[0] && t !== GLYPHS[BLACK] && t !== GLYPHS[WHITE]) {
            throw new ParseError(`expected to find either a cell or a space, found "${t}"`, l.line)
        }
    }
    return tokens
}

function parseMove(token: string, size: number, line: number): Move {
    if (token === "-1-1") return { ...PASS }
    const m = MOVE_TOKEN.exec(token)
    if (!m) throw new ParseError(`malformed move "${token}"`, line)
    const x = m[1].charCodeAt(0) - 97
    const y = Number(m[2]) - 1
    if (x >= size || y < 0 || y >= size) throw new ParseError(`move "${token}" is outside the board`, line)
    return { x, y }
}

function replayMove(board: Board, turnId: number, move: Move, player: Player, token: string, line: number) {
    const slot = 2 * (turnId - 1) + (player === BLACK ? 0 : 1)
    const history = board.getHistory()

    // the engine already recorded this pass when the previous move left the side without a move
    const recorded = history[slot]
    if (recorded) {
        if (recorded.forced && recorded.player === player && move.x === PASS.x && move.y === PASS.y) return
        throw new ParseError(`${GLYPHS[player]} move ${token} does not follow the recorded history`, line)
    }
    if (history.length !== slot || board.currentPlayer !== player) {
        throw new ParseError(`${GLYPHS[player]} is not the side to move at ${token}`, line)
    }

    try {
        board.play(move.x, move.y)
    } catch (err) {
        if (err instanceof IllegalMoveError || err instanceof GameOverError) {
            throw new ParseError(`${GLYPHS[player]} move ${token} is illegal (${err.message})`, line)
        }
        throw err
    }
}

function parseHistory(lines: Line[], size: Board["size"]): Board {
    const board = new Board(size)
    let expectedTurn = 1

    for (const l of lines) {
        const m = HISTORY_LINE.exec(l.text)
        if (!m) throw new ParseError(`incorrect line format: "${l.text}"`, l.line)

        const turnId = Number(m[1])
        if (turnId !== expectedTurn) throw new ParseError("incorrect turn number in history", l.line)
        if (board.turn !== turnId) throw new ParseError("history skips a move before this turn", l.line)
        expectedTurn++

        replayMove(board, turnId, parseMove(m[2], size, l.line), BLACK, m[2], l.line)
        const white = m[3]
        if (white !== undefined) replayMove(board, turnId, parseMove(white, size, l.line), WHITE, white, l.line)
    }

    return board
}

/**
 * Parses a save text into a Board.
 *
 * Without a history section the grid is taken as-is. With one, the moves are
 * replayed from the opening and the result must match the grid.
 */
export function parseSave(raw: string): Board {
    const lines = meaningfulLines(raw)
    const currentPlayer = parseColor(lines[0])

    const first = lines[1]
    if (!first) throw new ParseError("reached end of input before the board", lines[0].line)
    const size = rowTokens(first).length
    if (!isBoardSize(size)) throw new ParseError(`illegal board size value ${size}`, first.line)

    let black = 0n
    let white = 0n
    for (let y = 0; y < size; y++) {
        const l = lines[1 + y]
        if (!l) {
            const lastLine = lines[lines.length - 1]?.line ?? 1
            throw new ParseError("reached end of input before the board was complete", lastLine)
        }
        const tokens = rowTokens(l)
        if (tokens.length !== size) {
            throw new ParseError(`line of size ${tokens.length} where it should have been ${size}`, l.line)
        }
        tokens.forEach((t, x) => {
            const bit = 1n << BigInt(y * size + x)
            if (t === GLYPHS[BLACK]) black |= bit
            else if (t === GLYPHS[WHITE]) white |= bit
        })
    }

    const grid = new Board(size, { black, white, currentPlayer })
    const historyLines = lines.slice(1 + size)
    if (historyLines.length === 0) return grid

    const replayed = parseHistory(historyLines, size)
    if (!replayed.equals(grid)) {
        throw new ParseError("the board does not match the replayed history", historyLines[historyLines.length - 1].line)
    }
    return replayed
}
