import { create } from 'zustand';
import type { FlowStatus } from '../lib/flow';
import type { Phase } from '../types/flow';

type FlowSnapshot = {
  status: FlowStatus;
  phase: Phase;
  currentIndex: number;
  total: number;
};

type FlowStoreState = FlowSnapshot & {
  captionText: string;
  choicesVisible: boolean;
  lastError: string | null;
  setSnapshot: (snapshot: FlowSnapshot) => void;
  setCaptionText: (text: string) => void;
  setChoicesVisible: (visible: boolean) => void;
  setLastError: (message: string | null) => void;
  reset: () => void;
};

const INITIAL: Omit<
  FlowStoreState,
  'setSnapshot' | 'setCaptionText' | 'setChoicesVisible' | 'setLastError' | 'reset'
> = {
  status: 'idle',
  phase: 'Question',
  currentIndex: 0,
  total: 0,
  captionText: '',
  choicesVisible: false,
  lastError: null,
};

export const useFlowStore = create<FlowStoreState>()((set) => ({
  ...INITIAL,
  setSnapshot: (snapshot: FlowSnapshot) => set(snapshot),
  setCaptionText: (captionText: string) => set({ captionText }),
  setChoicesVisible: (choicesVisible: boolean) => set({ choicesVisible }),
  setLastError: (lastError: string | null) => set({ lastError }),
  reset: () => set(INITIAL),
}));
