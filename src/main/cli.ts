import { main } from './index'

void main(process.argv)
