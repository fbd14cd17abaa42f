import { Observable } from "rxjs";
import DEBUG from "debug";
import { isStateChangedData, type StateChangedEvent } from "../types";
import Socket from "./Socket";
import { filter, map, share } from "rxjs/operators";

const debug = DEBUG("power-average.events");

type StateChangedEventData = StateChangedEvent["data"];

type CreateEventStreamOptions = {
  type: string;
  event_type?: string;
};

export default class Events {
  socket: Socket;

  private stateChangedStream$?: Observable<StateChangedEventData>;

  constructor(dependencies: { socket: Socket }) {
    this.socket = dependencies.socket;
  }

  private createEventStream$(
    msg: CreateEventStreamOptions
  ): Observable<unknown> {
    debug("creating events stream for %j", msg);
    return this.socket.subscribe$(msg).pipe(map((item) => item.event.data));
  }

  type$(eventType: string): Observable<unknown> {
    return this.createEventStream$({
      type: "subscribe_events",
      event_type: eventType,
    });
  }

  /**
   * One shared subscription for all the entities we follow.
   */
  get stateChanged$(): Observable<StateChangedEventData> {
    if (!this.stateChangedStream$) {
      this.stateChangedStream$ = this.type$("state_changed").pipe(
        filter(isStateChangedData),
        share()
      );
    }

    return this.stateChangedStream$;
  }
}
