import React, { useState } from 'react';
import { Upload, Loader2, FileWarning, AlertCircle } from 'lucide-react';
import { readTabularFile, MAX_FILE_SIZE_MB } from '../utils';
import type { Dataset } from '../types';
import { Card, Button } from './ui/Components';
import { DataPreview } from './DataPreview';

interface FileUploaderProps {
  onDataLoaded: (dataset: Dataset | null) => void;
  datasetLabel: string;
  dataset: Dataset | null;
}

export const FileUploader: React.FC<FileUploaderProps> = ({ onDataLoaded, datasetLabel, dataset }) => {
  const [errorMsg, setErrorMsg] = useState('');
  const [tooLarge, setTooLarge] = useState(false);
  const [isLoading, setIsLoading] = useState(false);
  const [statusMsg, setStatusMsg] = useState('');

  const handleFile = async (file: File) => {
    setErrorMsg('');
    setTooLarge(file.size / (1024 * 1024) > MAX_FILE_SIZE_MB);
    setIsLoading(true);
    setStatusMsg(`Parsing ${file.name}...`);

    try {
        onDataLoaded(await readTabularFile(file));
    } catch (e) {
        console.error("File Parse Error", e);
        setErrorMsg('Error parsing file: ' + (e instanceof Error ? e.message : String(e)));
    } finally {
        setIsLoading(false);
        setStatusMsg('');
    }
  };

  if (dataset) {
    return (
      <div className="space-y-4">
        <div>
          <div className="flex justify-between items-end mb-2">
              <h3 className="text-sm font-semibold text-slate-900">{datasetLabel}</h3>
              <Button variant="ghost" size="sm" onClick={() => onDataLoaded(null)} className="text-red-500 hover:text-red-600">
                  Replace File
              </Button>
          </div>
          <DataPreview dataset={dataset} />
        </div>
      </div>
    );
  }

  return (
    <div className="space-y-4">
      <Card className="overflow-hidden">
        <div className="p-6 space-y-4">
          <div
            className="border-2 border-dashed border-slate-200 rounded-lg p-8 text-center hover:bg-slate-50 transition-colors"
            onDragOver={(e) => e.preventDefault()}
            onDrop={(e) => {
                e.preventDefault();
                const file = e.dataTransfer.files[0];
                if (file) void handleFile(file);
            }}
          >
            {isLoading ? (
              <div className="flex flex-col items-center py-4">
                <Loader2 className="animate-spin text-slate-400 mb-2" size={24} />
                <span className="text-slate-500 text-sm">{statusMsg || 'Processing...'}</span>
              </div>
            ) : (
              <>
                <div className="bg-slate-100 w-12 h-12 rounded-full flex items-center justify-center mx-auto mb-3">
                    <Upload className="text-slate-500" size={20} />
                </div>
                <p className="text-slate-900 font-medium mb-1">Click to upload or drag and drop</p>
                <p className="text-slate-500 text-xs mb-1">CSV or Excel</p>
                <p className="text-slate-400 text-[10px] mb-4">Max size: {MAX_FILE_SIZE_MB}MB</p>
                <input
                    type="file"
                    id={`file-${datasetLabel}`}
                    className="hidden"
                    accept=".csv,.xlsx,.xls"
                    onChange={(e) => {
                        const file = e.target.files?.[0];
                        if (file) void handleFile(file);
                        e.target.value = '';
                    }}
                />
                <label htmlFor={`file-${datasetLabel}`}>
                    <Button as="span" variant="outline" size="sm" className="cursor-pointer">Select {datasetLabel}</Button>
                </label>
              </>
            )}
          </div>

          {errorMsg && (
            <div className="p-3 bg-red-50 border border-red-200 rounded-md flex items-start gap-2">
                {tooLarge
                  ? <FileWarning size={16} className="text-red-500 mt-0.5 shrink-0" />
                  : <AlertCircle size={16} className="text-red-500 mt-0.5 shrink-0" />}
                <span className="text-xs text-red-600">{errorMsg}</span>
            </div>
          )}
        </div>
      </Card>
    </div>
  );
};
