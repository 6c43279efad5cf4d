export type MoveAction = { kind: 'MOVE'; moveId: string };
export type SwitchAction = { kind: 'SWITCH'; species: string };
export type ActionCandidate = MoveAction | SwitchAction;

/** 턴 포기 (재충전, 선택지 없음) */
export type PassAction = { kind: 'PASS' };
export type CommittedAction = ActionCandidate | PassAction;
