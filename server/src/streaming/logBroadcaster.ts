import type { Request, Response } from 'express';
import { parseLogChannel } from '@shared/utils/validation';
import type { LogEvent } from '@shared/types';
import type { ProgressReporter } from '../services/presentationGeneration';

const HEARTBEAT_MS = 25000;

/**
 * Anything an SSE frame can be written to. An Express Response in production.
 */
export interface LogSink {
    write(chunk: string): unknown;
}

export const formatLogEvent = (event: LogEvent) => `event: log\ndata: ${JSON.stringify(event)}\n\n`;

/**
 * Fans generation progress out to Server-Sent Events subscribers.
 *
 * Subscribers join a channel (one per browser tab). Messages published without a
 * channel reach every subscriber.
 */
export class LogBroadcaster {
    private readonly channels = new Map<string, Set<LogSink>>();

    get subscriberCount(): number {
        let total = 0;
        for (const sinks of this.channels.values()) total += sinks.size;
        return total;
    }

    subscribe(channel: string, sink: LogSink): () => void {
        let sinks = this.channels.get(channel);
        if (!sinks) {
            sinks = new Set();
            this.channels.set(channel, sinks);
        }
        sinks.add(sink);

        return () => {
            const current = this.channels.get(channel);
            if (!current) return;
            current.delete(sink);
            if (current.size === 0) this.channels.delete(channel);
        };
    }

    publish(channel: string | undefined, msg: string): void {
        const frame = formatLogEvent({ msg });
        const targets = channel === undefined
            ? Array.from(this.channels.values())
            : [this.channels.get(channel) ?? new Set<LogSink>()];

        for (const sinks of targets) {
            for (const sink of sinks) {
                sink.write(frame);
            }
        }
    }

    reporterFor(channel: string | undefined): ProgressReporter {
        return (msg) => {
            console.log(`[generate] ${msg}`);
            this.publish(channel, msg);
        };
    }

    /**
     * GET /events?channel=<id>
     */
    handleEvents = (req: Request, res: Response): void => {
        const channel = parseLogChannel(req.query.channel) ?? 'default';

        res.status(200).set({
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache, no-transform',
            Connection: 'keep-alive',
            'X-Accel-Buffering': 'no',
        });
        res.flushHeaders();
        res.write(': connected\n\n');

        const unsubscribe = this.subscribe(channel, res);
        const heartbeat = setInterval(() => res.write(': ping\n\n'), HEARTBEAT_MS);

        req.on('close', () => {
            clearInterval(heartbeat);
            unsubscribe();
        });
    };
}
