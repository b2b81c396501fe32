/**
 * Fan-out of streamed data to every open connection of one resource.
 *
 * Each subscriber is a sink over one socket. A sink that refuses a chunk
 * (returns false or throws) is pruned before send() returns; closed sockets
 * also unsubscribe themselves eagerly.
 */

export interface StreamSink {
  /** Deliver one chunk. false = the connection is gone */
  write(chunk: string): boolean;
  /** Terminate the underlying connection */
  close(): void;
}

export interface Subscription {
  unsubscribe(): void;
}

export class StreamBroadcaster {
  private sinks = new Set<StreamSink>();

  subscribe(sink: StreamSink): Subscription {
    this.sinks.add(sink);
    return {
      unsubscribe: () => {
        this.sinks.delete(sink);
      },
    };
  }

  /** Push data to every live subscriber, in call order per subscriber */
  send(data: string): void {
    for (const sink of [...this.sinks]) {
      let delivered: boolean;
      try {
        delivered = sink.write(data);
      } catch {
        delivered = false;
      }
      if (!delivered) {
        this.sinks.delete(sink);
      }
    }
  }

  sendLine(data: string): void {
    this.send(`${data}\n`);
  }

  /** Close and forget every subscriber */
  closeOpenConnections(): void {
    const sinks = [...this.sinks];
    this.sinks.clear();
    for (const sink of sinks) {
      sink.close();
    }
  }

  openConnectionsCount(): number {
    return this.sinks.size;
  }
}
