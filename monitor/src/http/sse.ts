import { Request, Response } from "express";

type Client = { id: string; res: Response };

/**
 * Server-sent events fan-out for the operator page. Cross-origin access is
 * left to the app's cors middleware.
 */
export class SseHub {
  private clients: Client[] = [];
  private nextId = 1;

  handler = (req: Request, res: Response): void => {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(`event: ping\ndata: "ready"\n\n`);

    const id = String(this.nextId++);
    this.clients.push({ id, res });
    req.on("close", () => {
      const i = this.clients.findIndex((c) => c.id === id);
      if (i >= 0) this.clients.splice(i, 1);
    });
  };

  broadcast(event: string, data: unknown): number {
    const payload = `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
    for (const c of this.clients) c.res.write(payload);
    return this.clients.length;
  }

  clientCount(): number {
    return this.clients.length;
  }

  closeAll(): void {
    for (const c of this.clients) c.res.end();
    this.clients = [];
  }
}
