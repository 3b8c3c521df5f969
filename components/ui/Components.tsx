import React from 'react';

type WithChildren = { children: React.ReactNode, className?: string };

// --- Card ---
export const Card = ({ children, className = '' }: WithChildren) => (
  <div className={`bg-white rounded-xl border border-slate-200 shadow-sm ${className}`}>
    {children}
  </div>
);

export const CardHeader = ({ children, className = '' }: WithChildren) => (
  <div className={`p-6 pb-2 ${className}`}>{children}</div>
);

export const CardContent = ({ children, className = '' }: WithChildren) => (
  <div className={`p-6 pt-2 ${className}`}>{children}</div>
);

export const CardTitle = ({ children }: { children: React.ReactNode }) => (
  <h3 className="text-lg font-semibold text-slate-900 tracking-tight">{children}</h3>
);

export const CardDescription = ({ children }: { children: React.ReactNode }) => (
  <p className="text-sm text-slate-500 mt-1">{children}</p>
);

// --- Button ---
interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: 'primary' | 'outline' | 'ghost';
  size?: 'sm' | 'md' | 'lg';
  as?: React.ElementType;
}

const buttonVariants = {
  primary: "bg-slate-900 text-white hover:bg-slate-800",
  outline: "border border-slate-200 bg-transparent hover:bg-slate-100 text-slate-900",
  ghost: "hover:bg-slate-100 text-slate-700",
};

const buttonSizes = {
  sm: "h-8 px-3 text-xs",
  md: "h-10 px-4 py-2 text-sm",
  lg: "h-12 px-8 text-base",
};

export const Button = ({ children, variant = 'primary', size = 'md', className = '', as: Component = 'button', ...props }: ButtonProps) => (
  <Component
    className={`inline-flex items-center justify-center rounded-md font-medium transition-colors focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400 disabled:pointer-events-none disabled:opacity-50 ${buttonVariants[variant]} ${buttonSizes[size]} ${className}`}
    {...props}
  >
    {children}
  </Component>
);

// --- Input ---
export const Input = ({ className = '', ...props }: React.InputHTMLAttributes<HTMLInputElement>) => (
  <input
    className={`flex h-10 w-full rounded-md border border-slate-200 bg-white px-3 py-2 text-sm placeholder:text-slate-400 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-slate-400 disabled:cursor-not-allowed disabled:opacity-50 ${className}`}
    {...props}
  />
);

// --- Toggle (checkbox with label and hint) ---
interface ToggleProps {
  label: string;
  hint?: string;
  checked: boolean;
  onChange: (checked: boolean) => void;
}

export const Toggle = ({ label, hint, checked, onChange }: ToggleProps) => (
  <label className={`flex items-start gap-3 p-3 rounded-lg border cursor-pointer transition-all ${
    checked ? 'border-blue-500 bg-blue-50' : 'border-slate-200 hover:bg-slate-50'
  }`}>
    <input
      type="checkbox"
      checked={checked}
      onChange={e => onChange(e.target.checked)}
      className="mt-0.5 rounded border-slate-300 text-blue-600 focus:ring-blue-500"
    />
    <div>
      <span className="text-sm font-medium text-slate-800">{label}</span>
      {hint && <p className="text-xs text-slate-500">{hint}</p>}
    </div>
  </label>
);

// --- Stat ---
const statTones = {
  default: { card: '', label: 'text-slate-500', value: 'text-slate-900' },
  success: { card: 'bg-green-50/50 border-green-100', label: 'text-green-600', value: 'text-green-700' },
  warning: { card: 'bg-amber-50/50 border-amber-100', label: 'text-amber-600', value: 'text-amber-700' },
  danger: { card: 'bg-red-50/50 border-red-100', label: 'text-red-600', value: 'text-red-700' },
};

export const Stat = ({ label, value, tone = 'default' }: { label: string, value: number, tone?: keyof typeof statTones }) => (
  <Card className={statTones[tone].card}>
    <CardContent className="flex flex-col items-center justify-center py-6">
      <span className={`${statTones[tone].label} text-xs uppercase tracking-wider font-semibold`}>{label}</span>
      <span className={`text-3xl font-bold ${statTones[tone].value} mt-1`}>{value.toLocaleString()}</span>
    </CardContent>
  </Card>
);

// --- Badge ---
export const Badge = ({ children, variant = 'default', className = '' }: { children: React.ReactNode, variant?: 'default' | 'outline', className?: string }) => {
  const styles = {
    default: "bg-slate-900 text-white",
    outline: "text-slate-900 border border-slate-200",
  };
  return (
    <div className={`inline-flex items-center rounded-full px-2.5 py-0.5 text-xs font-semibold ${styles[variant]} ${className}`}>
      {children}
    </div>
  );
};
