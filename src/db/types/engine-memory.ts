// 턴 경계를 넘어 유지되는 유일한 상태

export type EngineMemory = {
  lastActionTaken: string | null;
  justSwitched: boolean;
};

export const INITIAL_ENGINE_MEMORY: EngineMemory = {
  lastActionTaken: null,
  justSwitched: false,
};
