import DEBUG from "debug";
import { timer } from "rxjs";

import { catchError, switchMap, tap } from "rxjs/operators";

import meters$ from "./power/index";

const debug = DEBUG("power-average.index");

const process$ = meters$.pipe(
  tap((output) => {
    debug("published %j", output);
  })
);

debug("starting up");

process$
  .pipe(
    catchError((e, obs$) => {
      console.error("process errored", e);

      return timer(5000).pipe(switchMap(() => obs$));
    })
  )
  .subscribe({
    complete() {
      debug("completed process");
      process.exit(0);
    },
  });
