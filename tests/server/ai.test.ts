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

// FILE: tests/server/ai.test.ts

import { describe, expect, it } from "vitest"
import { SearchError } from "@/lib/errors"
import { BLACK, Board, PASS, WHITE } from "@/lib/othello"
import {
    SEARCHES,
    alphabeta,
    chooseAiMove,
    findBestMove,
    minimax,
    randomMove,
    resolveStrategy,
    type SearchStats,
} from "@/server/ai"
import { HEURISTICS, HEURISTIC_NAMES, coinParity } from "@/server/heuristics"
import { finishedBoard, whiteMustPass } from "../fixtures/positions"

function midgame(): Board {
    const board = new Board(8)
    board.play(3, 2)
    board.play(2, 2)
    board.play(2, 3)
    return board
}

describe("minimax", () => {
    it("returns the evaluation at depth zero", () => {
        const stats: SearchStats = { nodes: 0 }
        expect(minimax(new Board(8), 0, BLACK, coinParity, stats)).toBe(0)
        expect(stats.nodes).toBe(1)
    })

    it("visits every child one ply deep", () => {
        const stats: SearchStats = { nodes: 0 }
        expect(minimax(new Board(8), 1, BLACK, coinParity, stats)).toBe(60)
        expect(stats.nodes).toBe(5)
    })

    it("passes without spending depth", () => {
        const board = whiteMustPass()
        const before = board.export()
        const stats: SearchStats = { nodes: 0 }
        expect(minimax(board, 1, BLACK, coinParity, stats)).toBe(100)
        expect(stats.nodes).toBe(3)
        expect(board.export()).toBe(before)
        expect(board.currentPlayer).toBe(WHITE)
    })
})

describe("alphabeta", () => {
    it("agrees with minimax while visiting no more nodes", () => {
        for (const board of [new Board(6), midgame()]) {
            for (const name of HEURISTIC_NAMES) {
                for (const player of [BLACK, WHITE] as const) {
                    for (let depth = 1; depth <= 3; depth++) {
                        const full: SearchStats = { nodes: 0 }
                        const pruned: SearchStats = { nodes: 0 }
                        const expected = minimax(board, depth, player, HEURISTICS[name], full)
                        const actual = alphabeta(board, depth, -Infinity, Infinity, player, HEURISTICS[name], pruned)
                        expect(actual).toBe(expected)
                        expect(pruned.nodes).toBeLessThanOrEqual(full.nodes)
                    }
                }
            }
        }
    })

    it("leaves the board as it found it", () => {
        const board = midgame()
        const before = board.export()
        SEARCHES.alphabeta(board, 3, BLACK, HEURISTICS.allInOne)
        expect(board.export()).toBe(before)
        expect(board.getHistory()).toHaveLength(3)
    })
})

describe("findBestMove", () => {
    it("keeps the first of equally scored moves", () => {
        const board = new Board(8)
        expect(findBestMove(board, 1, BLACK, SEARCHES.minimax, coinParity)).toEqual({ x: 3, y: 2 })
    })

    it("is deterministic", () => {
        const board = midgame()
        const first = findBestMove(board, 3, WHITE, SEARCHES.alphabeta, HEURISTICS.allInOne)
        const second = findBestMove(board, 3, WHITE, SEARCHES.alphabeta, HEURISTICS.allInOne)
        expect(second).toEqual(first)
        expect(board.legalMoveList()).toContainEqual(first)
    })

    it("picks the same move with either search", () => {
        const board = midgame()
        for (let depth = 1; depth <= 3; depth++) {
            expect(findBestMove(board, depth, WHITE, SEARCHES.alphabeta, HEURISTICS.mobility)).toEqual(
                findBestMove(board, depth, WHITE, SEARCHES.minimax, HEURISTICS.mobility)
            )
        }
    })

    it("returns a pass when there is nothing to search", () => {
        expect(findBestMove(new Board(8), 0, BLACK, SEARCHES.minimax, coinParity)).toEqual(PASS)
        expect(findBestMove(finishedBoard(), 2, BLACK, SEARCHES.minimax, coinParity)).toEqual(PASS)
    })

    it("refuses to search for a side that must pass", () => {
        expect(() => findBestMove(whiteMustPass(), 2, WHITE, SEARCHES.minimax, coinParity)).toThrow(SearchError)
    })
})

describe("engine moves", () => {
    it("passes for a side without a move", () => {
        const strategy = resolveStrategy({ depth: 2, algorithm: "alphabeta", heuristic: "coinParity" })
        expect(chooseAiMove(whiteMustPass(), strategy)).toEqual(PASS)
    })

    it("searches with the configured strategy", () => {
        const strategy = resolveStrategy({ depth: 1, algorithm: "minimax", heuristic: "coinParity" })
        expect(strategy).toEqual({ kind: "search", depth: 1, search: SEARCHES.minimax, heuristic: HEURISTICS.coinParity })
        expect(chooseAiMove(new Board(8), strategy)).toEqual({ x: 3, y: 2 })
    })

    it("plays a legal move at random when asked to", () => {
        const strategy = resolveStrategy({ depth: 3, algorithm: "random", heuristic: "allInOne" })
        expect(strategy.kind).toBe("random")
        const board = new Board(8)
        expect(board.legalMoveList()).toContainEqual(chooseAiMove(board, strategy))
        expect(chooseAiMove(whiteMustPass(), strategy)).toEqual(PASS)
    })

    it("draws random moves from the legal ones", () => {
        const board = new Board(8)
        expect(randomMove(board, () => 0)).toEqual({ x: 3, y: 2 })
        expect(randomMove(board, () => 0.99)).toEqual({ x: 4, y: 5 })
        expect(board.legalMoveList()).toContainEqual(randomMove(board))
        expect(randomMove(whiteMustPass())).toEqual(PASS)
    })
})
