import { Command, InvalidArgumentError } from 'commander'

export { Command, InvalidArgumentError }
