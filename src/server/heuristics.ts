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

// FILE: src/server/heuristics.ts

import { opposite, type Board, type Player } from "@/lib/othello"

export type Heuristic = (board: Board, maxPlayer: Player) => number

export const HEURISTIC_NAMES = ["cornersCaptured", "coinParity", "mobility", "allInOne"] as const
export type HeuristicName = (typeof HEURISTIC_NAMES)[number]

// weights of the composite evaluation
const W_CORNERS = 10
const W_MOBILITY = 4
const W_COINS = 1

function normalizedDiff(mine: number, theirs: number): number {
    if (mine + theirs === 0) return 0
    return Math.trunc((100 * (mine - theirs)) / (mine + theirs))
}

export function cornersCaptured(board: Board, maxPlayer: Player): number {
    const last = board.size - 1
    const corners: ReadonlyArray<readonly [number, number]> = [
        [0, 0],
        [last, 0],
        [0, last],
        [last, last],
    ]

    const opp = opposite(maxPlayer)
    let mine = 0
    let theirs = 0
    for (const [x, y] of corners) {
        const d = board.cellAt(x, y)
        if (d === maxPlayer) mine++
        else if (d === opp) theirs++
    }

    return normalizedDiff(mine, theirs)
}

export function coinParity(board: Board, maxPlayer: Player): number {
    return normalizedDiff(board.count(maxPlayer), board.count(opposite(maxPlayer)))
}

export function mobility(board: Board, maxPlayer: Player): number {
    const mine = board.legalMoves(maxPlayer).popcount()
    const theirs = board.legalMoves(opposite(maxPlayer)).popcount()
    return normalizedDiff(mine, theirs)
}

export function allInOne(board: Board, maxPlayer: Player): number {
    return (
        W_CORNERS * cornersCaptured(board, maxPlayer) +
        W_MOBILITY * mobility(board, maxPlayer) +
        W_COINS * coinParity(board, maxPlayer)
    )
}

export const HEURISTICS: Readonly<Record<HeuristicName, Heuristic>> = {
    cornersCaptured,
    coinParity,
    mobility,
    allInOne,
}
