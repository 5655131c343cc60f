export {
	createEventEmitter,
	type EventEmitterOptions,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";
