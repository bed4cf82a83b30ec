import { STATUS_CODES } from 'http';
import type { FastifyReply } from 'fastify';

/** Plain-text reply whose body is only the status text, e.g. "Internal Server Error\n". */
export function sendStatusText(reply: FastifyReply, code: number) {
  return sendText(reply, code, STATUS_CODES[code] ?? String(code));
}

export function sendText(reply: FastifyReply, code: number, text: string) {
  return reply
    .code(code)
    .header('Content-Type', 'text/plain; charset=utf-8')
    .header('X-Content-Type-Options', 'nosniff')
    .send(`${text}\n`);
}
