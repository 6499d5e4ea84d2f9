import { Command } from 'commander'
import {
  makeCallCommand,
  makeDecodeRevertCommand,
  makeDeployCommand,
  makeLinkCommand,
  makeSendCommand,
  makeUtilsCommand,
  makeVerifyCommand
} from './commands'

export function setupCommands(program: Command): void {
  program.addCommand(makeCallCommand())
  program.addCommand(makeSendCommand())
  program.addCommand(makeDeployCommand())
  program.addCommand(makeVerifyCommand())
  program.addCommand(makeLinkCommand())
  program.addCommand(makeDecodeRevertCommand())
  program.addCommand(makeUtilsCommand())
}
