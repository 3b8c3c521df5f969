import React from 'react';
import { UploadCloud, SlidersHorizontal, FileDiff, type LucideIcon } from 'lucide-react';

export type Step = 'upload' | 'options' | 'results';

interface StepIndicatorProps {
  currentStep: Step;
  onStepChange: (step: Step) => void;
  canNavigate: boolean;
}

const steps: { id: Step; label: string; icon: LucideIcon }[] = [
  { id: 'upload', label: 'Files', icon: UploadCloud },
  { id: 'options', label: 'Keys & Options', icon: SlidersHorizontal },
  { id: 'results', label: 'Differences', icon: FileDiff },
];

export const StepIndicator: React.FC<StepIndicatorProps> = ({ currentStep, onStepChange, canNavigate }) => {
  const currentIndex = steps.findIndex(s => s.id === currentStep);

  return (
    <div className="w-full bg-white border-b border-slate-200 px-4 py-4">
      <div className="max-w-2xl mx-auto flex items-center justify-between relative">

        <div className="absolute top-1/2 left-0 w-full h-0.5 bg-slate-100 -z-10 -translate-y-1/2 rounded-full" />

        {steps.map((step, idx) => {
          const isActive = idx === currentIndex;
          const isCompleted = currentIndex > idx;
          // Going back is always allowed, going forward only once both files are loaded
          const isClickable = idx <= currentIndex || canNavigate;
          const Icon = step.icon;

          return (
            <button
              key={step.id}
              onClick={() => isClickable && onStepChange(step.id)}
              disabled={!isClickable}
              className={`group flex flex-col items-center justify-center bg-white px-2 transition-all ${
                 isClickable ? 'cursor-pointer' : 'cursor-default'
              }`}
            >
              <div
                className={`w-8 h-8 rounded-full flex items-center justify-center border-2 transition-all duration-300 ${
                  isActive
                    ? 'border-blue-600 bg-blue-600 text-white shadow-md shadow-blue-200'
                    : isCompleted
                    ? 'border-blue-600 bg-white text-blue-600'
                    : 'border-slate-200 bg-white text-slate-300'
                }`}
              >
                <Icon size={14} strokeWidth={2.5} />
              </div>
              <span className={`mt-2 text-xs font-semibold tracking-wide ${
                isActive ? 'text-blue-700' : isCompleted ? 'text-slate-600' : 'text-slate-400'
              }`}>
                {step.label}
              </span>
            </button>
          );
        })}
      </div>
    </div>
  );
};
