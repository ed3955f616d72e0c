export { PassThrough, Readable } from 'stream'
