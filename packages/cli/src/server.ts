import { createServer, type AddressInfo, type Server } from 'node:net'
import type { Duplex } from 'node:stream'
import { errorMessage, type Logger } from '@vtline/core'
import { runSession } from './session'
import type { SessionSettings } from './settings'

/** Runs a session over `socket` and closes it afterwards. Never rejects. */
export async function serveConnection(
    socket: Duplex,
    peer: string,
    settings: SessionSettings,
    logger: Logger,
): Promise<void> {
    logger.info('connection opened', { peer })
    try {
        const handled = await runSession({ input: socket, output: socket }, settings, logger)
        logger.info('connection closed', { peer, handled })
        socket.end()
    } catch (err) {
        logger.warn('connection failed', { peer, error: errorMessage(err) })
        socket.destroy()
    }
}

/** TCP server giving every connection its own editor and history. */
export function createLineServer(settings: SessionSettings, logger: Logger): Server {
    return createServer((socket) => {
        const peer = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`
        socket.on('error', (err) => {
            logger.debug('socket error', { peer, error: err.message })
        })
        void serveConnection(socket, peer, settings, logger)
    })
}

export function listen(server: Server, port: number, host?: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
        server.once('error', reject)
        server.listen(port, host, () => {
            server.off('error', reject)
            const address = server.address()
            if (address === null || typeof address === 'string') {
                reject(new Error(`unexpected server address: ${String(address)}`))
                return
            }
            resolve(address)
        })
    })
}
