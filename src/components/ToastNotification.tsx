import { useEffect } from 'react';

export type ToastType = 'success' | 'info' | 'error';

export interface Toast {
  id: string;
  message: string;
  type: ToastType;
  duration?: number;
}

interface ToastNotificationProps {
  toasts: Toast[];
  onRemove: (id: string) => void;
}

const TOAST_ICONS: Record<ToastType, string> = {
  success: '✓',
  info: 'ℹ',
  error: '✕',
};

const DEFAULT_TOAST_MS = 4000;

const ToastItem = ({ toast, onRemove }: { toast: Toast; onRemove: (id: string) => void }) => {
  const duration = toast.duration ?? DEFAULT_TOAST_MS;

  useEffect(() => {
    const timer = window.setTimeout(() => onRemove(toast.id), duration);
    return () => window.clearTimeout(timer);
  }, [toast.id, duration, onRemove]);

  return (
    <div className={`toast-item toast-${toast.type}`} role={toast.type === 'error' ? 'alert' : 'status'}>
      <span className="toast-icon">{TOAST_ICONS[toast.type]}</span>
      <span className="toast-message">{toast.message}</span>
      <button
        className="toast-close"
        type="button"
        onClick={() => onRemove(toast.id)}
        aria-label="Close notification"
      >
        ×
      </button>
    </div>
  );
};

export const ToastNotification = ({ toasts, onRemove }: ToastNotificationProps) => (
  <div className="toast-container">
    {toasts.map((toast) => (
      <ToastItem key={toast.id} toast={toast} onRemove={onRemove} />
    ))}
  </div>
);
