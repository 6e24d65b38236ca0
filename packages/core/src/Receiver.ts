export enum Receiver {
	Sender = 'sender',
	All = 'all'
}
