import { merge, Observable } from "rxjs";
import { filter, map, share } from "rxjs/operators";
import DEBUG from "debug";
import { isHassEntity, type HassEntityBase } from "../types";
import type Events from "./Events";
import type Socket from "./Socket";

const debug = DEBUG("power-average.states");

export default class States {
  socket: Pick<Socket, "single$">;
  events: Pick<Events, "stateChanged$">;

  private allStream$?: Observable<HassEntityBase[]>;

  constructor(dependencies: {
    socket: Pick<Socket, "single$">;
    events: Pick<Events, "stateChanged$">;
  }) {
    this.socket = dependencies.socket;
    this.events = dependencies.events;
  }

  /**
   * Returns an observable with all the states.
   *
   * Entities asked for while a `get_states` request is out share its answer.
   * Later subscribers send a new one, so they never see stale states.
   */
  get all$(): Observable<HassEntityBase[]> {
    if (!this.allStream$) {
      this.allStream$ = this.socket.single$({ type: "get_states" }).pipe(
        map((v) => {
          const result: unknown = v.result;
          return Array.isArray(result) ? result.filter(isHassEntity) : [];
        }),
        share()
      );
    }

    return this.allStream$;
  }

  private updatesForEntityId$(entityId: string): Observable<HassEntityBase> {
    return this.events.stateChanged$.pipe(
      filter((v) => v.entity_id === entityId),
      map((v) => v.new_state),
      filter((v): v is HassEntityBase => v !== null)
    );
  }

  /**
   * The current state of an entity followed by every change to it.
   */
  entity$(entityId: string): Observable<HassEntityBase> {
    const initial$ = this.all$.pipe(
      map((all) => all.find((item) => item.entity_id === entityId)),
      filter((v): v is HassEntityBase => {
        if (!v) {
          debug("entity %s does not exist (yet)", entityId);
        }

        return !!v;
      })
    );

    // First, grab all of them and fetch the one for that specific entityId.
    // Then, subscribe to the state_change events for that entityId.
    return merge(initial$, this.updatesForEntityId$(entityId));
  }
}
