import { createStore } from 'zustand/vanilla'
import type { Toast } from '@/types/index.ts'
import { generateId } from '@/utils/pdf.ts'

interface AppState {
  toasts: Toast[]

  // Actions
  addToast: (toast: Omit<Toast, 'id'>) => string
  removeToast: (id: string) => void
  clearToasts: () => void
}

export const appStore = createStore<AppState>((set) => ({
  toasts: [],

  addToast: (toast) => {
    const id = generateId()
    set((s) => ({ toasts: [...s.toasts, { ...toast, id }] }))
    const duration = toast.duration ?? 3000
    if (duration > 0) {
      // Never keep the process alive just to dismiss a notice
      setTimeout(() => {
        set((s) => ({ toasts: s.toasts.filter((t) => t.id !== id) }))
      }, duration).unref()
    }
    return id
  },

  removeToast: (id) =>
    set((s) => ({ toasts: s.toasts.filter((t) => t.id !== id) })),

  clearToasts: () => set({ toasts: [] }),
}))
