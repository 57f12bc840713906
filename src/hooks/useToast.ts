import { useCallback, useState } from 'react';

import type { Toast, ToastType } from '../components/ToastNotification';

let toastCounter = 0;

export const useToast = () => {
  const [toasts, setToasts] = useState<Toast[]>([]);

  const removeToast = useCallback((id: string) => {
    setToasts((prev) => prev.filter((toast) => toast.id !== id));
  }, []);

  const showToast = useCallback((message: string, type: ToastType, duration?: number) => {
    toastCounter += 1;
    const toast: Toast = { id: `toast-${toastCounter}`, message, type, duration };
    setToasts((prev) => [...prev, toast]);
    return toast.id;
  }, []);

  const success = useCallback((message: string) => showToast(message, 'success'), [showToast]);
  const error = useCallback((message: string) => showToast(message, 'error'), [showToast]);
  const info = useCallback((message: string) => showToast(message, 'info'), [showToast]);

  return {
    toasts,
    removeToast,
    showToast,
    success,
    error,
    info,
  };
};
