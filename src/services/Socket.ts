import {
  filter,
  map,
  share,
  shareReplay,
  switchMap,
  take,
  tap,
} from "rxjs/operators";
import DEBUG from "debug";

import { EMPTY, merge, Observable } from "rxjs";

import Config from "./Config";
import WebSocket from "./WebSocket";
import { URL } from "url";
import {
  isEventMessage,
  isMessage,
  isResultMessage,
  type EventMessage,
  type MessageBase,
  type ResultMessage,
} from "../types";

const debug = DEBUG("power-average.socket");

type SocketManager = {
  messages$: Observable<MessageBase>;
  sendWithId$: (message: Record<string, unknown>) => Observable<MessageBase>;
};

function parse(raw: string): MessageBase[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    debug("dropping message that is not JSON: %s", raw);
    return [];
  }

  // Home Assistant may coalesce several messages into one array frame.
  const messages: unknown[] = Array.isArray(parsed) ? parsed : [parsed];

  return messages.filter(isMessage);
}

/**
 * Home Assistant websocket API.
 * Authenticates with the configured token and correlates requests by id.
 */
export default class Socket {
  config: Config;

  socket$: Observable<SocketManager>;

  constructor({ config }: { config: Config }) {
    this.config = config;

    this.socket$ = this.config.root$().pipe(
      map((config) => {
        debug("making new websocket for HA at %s", config.host);

        const url = new URL(config.host);
        const ws = `ws${url.protocol === "https:" ? "s" : ""}://${url.host}/api/websocket`;

        const socket = new WebSocket(ws);

        const parsedMessages$ = socket.messages$.pipe(
          switchMap((raw) => parse(raw)),
          share()
        );

        const rawSend$ = (msg: Record<string, unknown>) => {
          return socket.send$(JSON.stringify(msg));
        };

        const respondToAuthentication$ = parsedMessages$.pipe(
          filter((msg) => msg.type === "auth_required"),
          tap(() => debug("auth required, sending token")),
          switchMap(() =>
            rawSend$({ type: "auth", access_token: config.token })
          ),
          switchMap(() => EMPTY)
        );

        const authenticated$ = parsedMessages$.pipe(
          filter((msg) => {
            if (msg.type === "auth_invalid") {
              throw new Error(
                `Home Assistant refused the token: ${String(msg.message)}`
              );
            }

            return msg.type === "auth_ok";
          }),
          tap(() => debug("authenticated")),
          shareReplay(1)
        );

        let i = 0;
        function next() {
          i += 1;
          return i;
        }

        const messages$ = merge(respondToAuthentication$, parsedMessages$).pipe(
          share()
        );

        return {
          messages$,
          sendWithId$(message: Record<string, unknown>) {
            const id = next();

            const result$ = messages$.pipe(filter((item) => item.id === id));

            const sendAndHide$ = authenticated$.pipe(
              take(1),
              switchMap(() => rawSend$({ ...message, id })),
              switchMap(() => EMPTY)
            );

            return merge(result$, sendAndHide$);
          },
        };
      }),
      shareReplay(1)
    );
  }

  /**
   * Sends a command and emits its result once.
   */
  single$(message: Record<string, unknown>): Observable<ResultMessage> {
    return this.socket$.pipe(
      switchMap((socket) => {
        return socket.sendWithId$(message).pipe(filter(isResultMessage), take(1));
      }),
      tap((result) => {
        if (!result.success) {
          throw new Error(`command ${String(message.type)} failed`);
        }
      })
    );
  }

  /**
   * Sends a subscription and emits every event it yields.
   */
  subscribe$(message: Record<string, unknown>): Observable<EventMessage> {
    return this.socket$.pipe(
      switchMap((socket) => {
        return socket.sendWithId$(message).pipe(filter(isEventMessage));
      })
    );
  }
}
