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

// FILE: src/server/ai.ts

import { SearchError } from "@/lib/errors"
import { PASS, type Board, type Move, type Player } from "@/lib/othello"
import { HEURISTICS, type Heuristic, type HeuristicName } from "./heuristics"

export const ALGORITHMS = ["minimax", "alphabeta", "random"] as const
export type Algorithm = (typeof ALGORITHMS)[number]
export type SearchAlgorithm = Exclude<Algorithm, "random">

export type SearchStats = { nodes: number }

export type Search = (board: Board, depth: number, maxPlayer: Player, heuristic: Heuristic, stats?: SearchStats) => number

export type Strategy =
    | { kind: "search"; depth: number; search: Search; heuristic: Heuristic }
    | { kind: "random"; random: () => number }

/*
Both searches walk the tree in place: every `play` is matched by a `pop` before the
function returns, so the board a caller passes in comes back unchanged.
A side without a legal move passes and the search continues at the same depth.
*/
export function minimax(
    board: Board,
    depth: number,
    maxPlayer: Player,
    heuristic: Heuristic,
    stats?: SearchStats
): number {
    if (stats) stats.nodes++
    if (depth <= 0 || board.isGameOver()) return heuristic(board, maxPlayer)

    const moves = board.legalMoveList()
    if (moves.length === 0) {
        board.play(PASS.x, PASS.y)
        const v = minimax(board, depth, maxPlayer, heuristic, stats)
        board.pop()
        return v
    }

    const maximizing = board.currentPlayer === maxPlayer
    let best = maximizing ? -Infinity : Infinity
    for (const m of moves) {
        board.play(m.x, m.y)
        const v = minimax(board, depth - 1, maxPlayer, heuristic, stats)
        board.pop()
        if (maximizing ? v > best : v < best) best = v
    }
    return best
}

export function alphabeta(
    board: Board,
    depth: number,
    alpha: number,
    beta: number,
    maxPlayer: Player,
    heuristic: Heuristic,
    stats?: SearchStats
): number {
    if (stats) stats.nodes++
    if (depth <= 0 || board.isGameOver()) return heuristic(board, maxPlayer)

    const moves = board.legalMoveList()
    if (moves.length === 0) {
        board.play(PASS.x, PASS.y)
        const v = alphabeta(board, depth, alpha, beta, maxPlayer, heuristic, stats)
        board.pop()
        return v
    }

    if (board.currentPlayer === maxPlayer) {
        let best = -Infinity
        for (const m of moves) {
            board.play(m.x, m.y)
            const v = alphabeta(board, depth - 1, alpha, beta, maxPlayer, heuristic, stats)
            board.pop()
            if (v > best) best = v
            if (v > alpha) alpha = v
            if (beta <= alpha) break
        }
        return best
    } else {
        let best = Infinity
        for (const m of moves) {
            board.play(m.x, m.y)
            const v = alphabeta(board, depth - 1, alpha, beta, maxPlayer, heuristic, stats)
            board.pop()
            if (v < best) best = v
            if (v < beta) beta = v
            if (beta <= alpha) break
        }
        return best
    }
}

export const SEARCHES: Readonly<Record<SearchAlgorithm, Search>> = {
    minimax,
    alphabeta: (board, depth, maxPlayer, heuristic, stats) =>
        alphabeta(board, depth, -Infinity, Infinity, maxPlayer, heuristic, stats),
}

/**
 * Scores every legal move of the side to move at `depth - 1` and returns the
 * first best one. Returns `PASS` when there is nothing to search.
 */
export function findBestMove(
    board: Board,
    depth: number,
    maxPlayer: Player,
    search: Search,
    heuristic: Heuristic,
    stats?: SearchStats
): Move {
    if (depth <= 0 || board.isGameOver()) return { ...PASS }

    const moves = board.legalMoveList()
    if (moves.length === 0) {
        throw new SearchError("The side to move has no legal move; record a pass instead of searching")
    }

    const maximizing = board.currentPlayer === maxPlayer
    let best: { move: Move; score: number } | null = null
    for (const m of moves) {
        board.play(m.x, m.y)
        const score = search(board, depth - 1, maxPlayer, heuristic, stats)
        board.pop()
        if (!best || (maximizing ? score > best.score : score < best.score)) best = { move: m, score }
    }

    return best ? best.move : { ...PASS }
}

function pickRandom(moves: Move[], random: () => number): Move {
    return moves[Math.min(moves.length - 1, Math.floor(random() * moves.length))]
}

function secureRandom(): number {
    const a = new Uint32Array(1)
    crypto.getRandomValues(a)
    return a[0] / 0x1_0000_0000
}

export function randomMove(board: Board, random: () => number = secureRandom): Move {
    const moves = board.legalMoveList()
    if (moves.length === 0) return { ...PASS }
    return pickRandom(moves, random)
}

export function resolveStrategy(settings: { depth: number; algorithm: Algorithm; heuristic: HeuristicName }): Strategy {
    if (settings.algorithm === "random") return { kind: "random", random: secureRandom }
    return {
        kind: "search",
        depth: settings.depth,
        search: SEARCHES[settings.algorithm],
        heuristic: HEURISTICS[settings.heuristic],
    }
}

/** The move the engine plays for the side to move; `PASS` when it has no legal move. */
export function chooseAiMove(board: Board, strategy: Strategy): Move {
    if (!board.hasLegalMove()) return { ...PASS }
    if (strategy.kind === "random") return randomMove(board, strategy.random)
    return findBestMove(board, strategy.depth, board.currentPlayer, strategy.search, strategy.heuristic)
}
