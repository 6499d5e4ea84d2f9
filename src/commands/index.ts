export { makeCallCommand, makeSendCommand } from './call'
export { makeDecodeRevertCommand } from './decode'
export { makeDeployCommand } from './deploy'
export { makeLinkCommand } from './link'
export { makeUtilsCommand } from './utils'
export { makeVerifyCommand } from './verify'
