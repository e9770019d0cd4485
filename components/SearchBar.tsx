import React from 'react';
import { Search, X } from 'lucide-react';

interface SearchBarProps {
  value: string;
  onChange: (value: string) => void;
}

export const SearchBar: React.FC<SearchBarProps> = ({ value, onChange }) => {
  return (
    <div className="p-2.5 bg-white border-t border-slate-200">
      <div className="relative">
        <span className="absolute left-3 top-2.5 text-slate-500 pointer-events-none">
          <Search size={16} />
        </span>
        <input
          type="search"
          aria-label="Search"
          value={value}
          onChange={(e) => onChange(e.target.value)}
          placeholder="Search"
          className="w-full bg-slate-100 border border-slate-300 rounded-full pl-9 pr-9 py-2.5 text-slate-900 focus:ring-2 focus:ring-indigo-500 outline-none transition-all placeholder-slate-500"
        />
        {value && (
          <button
            type="button"
            aria-label="Clear search"
            onClick={() => onChange('')}
            className="absolute right-3 top-2.5 text-slate-500 hover:text-slate-800"
          >
            <X size={16} />
          </button>
        )}
      </div>
    </div>
  );
};
