import { filter, map, shareReplay, switchMap, take } from "rxjs/operators";
import WS from "ws";
import DEBUG from "debug";

import { Observable } from "rxjs";

const debug = DEBUG("power-average.web-socket");

/**
 * Thin observable wrapper around a `ws` connection.
 *
 * NOTE: This is not injected with awilix.
 */
export default class WebSocket {
  url: string;

  private socket$: Observable<WS>;

  constructor(url: string) {
    debug("building WebSocket instance for url %s", url);
    this.url = url;

    this.socket$ = new Observable<WS>((observer) => {
      debug("creating socket with url %s", url);
      const ws = new WS(url);

      const onOpen = () => observer.next(ws);
      const onClose = () => {
        debug("completed websocket");
        observer.complete();
      };
      const onError = (error: Error) => {
        debug("got error event %s", error.message);
        observer.error(error);
      };

      ws.on("open", onOpen);
      ws.on("close", onClose);
      ws.on("error", onError);

      return () => {
        debug("cleaning up after websocket");
        ws.off("open", onOpen);
        ws.off("close", onClose);
        ws.off("error", onError);
        ws.close();
      };
    }).pipe(shareReplay({ bufferSize: 1, refCount: true }));
  }

  send$(message: string): Observable<boolean> {
    return this.socket$.pipe(
      take(1),
      map((socket) => {
        debug("sending message %s", message);
        socket.send(message);

        return true;
      })
    );
  }

  /**
   * Text frames received on the socket.
   */
  get messages$(): Observable<string> {
    return this.socket$.pipe(
      switchMap(
        (socket) =>
          new Observable<{ data: WS.RawData; isBinary: boolean }>(
            (observer) => {
              const onMessage = (data: WS.RawData, isBinary: boolean) =>
                observer.next({ data, isBinary });

              socket.on("message", onMessage);

              return () => {
                socket.off("message", onMessage);
              };
            }
          )
      ),
      filter(({ isBinary }) => !isBinary),
      map(({ data }) => data.toString())
    );
  }
}
