import { createContainer, InjectionMode, asClass, Lifetime } from "awilix";

import Config from "./Config";
import Socket from "./Socket";
import States from "./States";
import Events from "./Events";
import Mqtt from "./Mqtt";
import HassStatus from "./HassStatus";
import Discovery from "./Discovery";
import Sensor from "./Sensor";

export interface IServicesCradle {
  config: Config;
  socket: Socket;
  states: States;
  events: Events;
  mqtt: Mqtt;
  hassStatus: HassStatus;
  discovery: Discovery;
  sensor: Sensor;
}

// sets up awilix ... .
const container = createContainer<IServicesCradle>({
  injectionMode: InjectionMode.PROXY,
});

// just register the services.
container.register({
  config: asClass(Config, { lifetime: Lifetime.SINGLETON }),
  socket: asClass(Socket, { lifetime: Lifetime.SINGLETON }),
  states: asClass(States, { lifetime: Lifetime.SINGLETON }),
  events: asClass(Events, { lifetime: Lifetime.SINGLETON }),
  mqtt: asClass(Mqtt, { lifetime: Lifetime.SINGLETON }),
  hassStatus: asClass(HassStatus, { lifetime: Lifetime.SINGLETON }),
  discovery: asClass(Discovery, { lifetime: Lifetime.SINGLETON }),
  sensor: asClass(Sensor, { lifetime: Lifetime.SINGLETON }),
});

export default container.cradle;
