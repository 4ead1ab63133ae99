export { LogNotifier } from './notifier'
export type { Notifier } from './notifier'
export { Updater } from './updater'
