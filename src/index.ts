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

// FILE: src/index.ts

import { node } from "@elysiajs/node"
import { Elysia } from "elysia"
import { createRedis } from "@/lib/redis"
import { createApp } from "@/server/app"
import { loadConfig } from "@/server/config"
import { redisSessionStore } from "@/server/session"

const config = loadConfig()
const store = redisSessionStore(createRedis(config.redis), config.sessionTtlSeconds)

new Elysia({ adapter: node() })
    .onError({ as: "global" }, ({ code, error }) => {
        if (code === "UNKNOWN" || code === "INTERNAL_SERVER_ERROR") console.error(error)
    })
    .use(createApp(store))
    .listen(config.port, () => {
        console.log(`othello engine listening on port ${config.port}`)
    })
