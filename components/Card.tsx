import React, { useState } from 'react';
import { ChevronDown, ChevronRight } from 'lucide-react';

interface CardProps {
  children?: React.ReactNode;
  title?: string;
  icon?: React.ElementType;
  className?: string;
}

export const Card = ({ children, title, icon: Icon, className = "" }: CardProps) => (
  <div className={`bg-white rounded-xl shadow-sm border border-slate-200 p-6 ${className}`}>
    {title && (
      <div className="flex items-center gap-2 mb-4">
        {Icon && <Icon className="w-5 h-5 text-indigo-600" />}
        <h3 className="font-semibold text-slate-800">{title}</h3>
      </div>
    )}
    {children}
  </div>
);

interface ExpanderProps {
  title: string;
  children?: React.ReactNode;
  defaultOpen?: boolean;
}

// Collapsible section; content is only mounted while open
export const Expander = ({ title, children, defaultOpen = false }: ExpanderProps) => {
  const [open, setOpen] = useState(defaultOpen);

  return (
    <div className="bg-white rounded-xl border border-slate-200 overflow-hidden">
      <button
        type="button"
        onClick={() => setOpen(prev => !prev)}
        aria-expanded={open}
        className="w-full flex items-center gap-2 px-4 py-3 text-left text-sm font-medium text-slate-700 hover:bg-slate-50 transition-colors"
      >
        {open ? <ChevronDown className="w-4 h-4" /> : <ChevronRight className="w-4 h-4" />}
        {title}
      </button>
      {open && <div className="px-4 pb-4 border-t border-slate-100 pt-4">{children}</div>}
    </div>
  );
};

export const Alert = ({ tone, children }: { tone: 'error' | 'warning' | 'success' | 'info'; children?: React.ReactNode }) => {
  const styles = {
    error: 'bg-red-50 border-red-200 text-red-700',
    warning: 'bg-amber-50 border-amber-200 text-amber-800',
    success: 'bg-emerald-50 border-emerald-200 text-emerald-700',
    info: 'bg-blue-50 border-blue-200 text-blue-700',
  };
  return (
    <div role={tone === 'error' || tone === 'warning' ? 'alert' : 'status'} className={`p-3 rounded-lg border text-sm ${styles[tone]}`}>
      {children}
    </div>
  );
};
