export { registerValidateCommand } from './validate';
export { registerJudgeCommand } from './judge';
export { registerCompareCommand } from './compare';
export { registerChatCommand } from './chat';
