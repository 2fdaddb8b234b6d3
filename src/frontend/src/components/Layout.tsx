import { Link, useLocation } from 'react-router-dom'
import { BookOpen, Camera, Download, Info, MapPin, Sun } from 'lucide-react'
import clsx from 'clsx'
import { downloadTextFile } from '../lib/download'
import { FAULT_CATEGORIES, HEALTHY_CATEGORY, type GeneratedReport } from '../types'

interface LayoutProps {
  children: React.ReactNode
  report: GeneratedReport | null
}

const navigation = [
  { name: 'Detect', href: '/', icon: Camera },
  { name: 'Fault Guide', href: '/faults', icon: BookOpen },
]

const detectableFaults = FAULT_CATEGORIES.filter((category) => category !== HEALTHY_CATEGORY)

export default function Layout({ children, report }: LayoutProps) {
  const location = useLocation()

  return (
    <div className="min-h-screen bg-gray-100">
      {/* Sidebar */}
      <div className="fixed inset-y-0 left-0 w-72 bg-white shadow-lg overflow-y-auto">
        <div className="flex items-center gap-2 px-6 py-4 border-b">
          <Sun className="h-8 w-8 text-yellow-500" />
          <span className="text-xl font-bold text-gray-900">Solar Detection</span>
        </div>

        <nav className="mt-6 px-3">
          {navigation.map((item) => {
            const isActive = location.pathname === item.href
            return (
              <Link
                key={item.name}
                to={item.href}
                className={clsx(
                  'flex items-center gap-3 px-3 py-2 rounded-lg mb-1 transition-colors',
                  isActive
                    ? 'bg-primary-100 text-primary-700'
                    : 'text-gray-600 hover:bg-gray-100'
                )}
              >
                <item.icon className="h-5 w-5" />
                <span className="font-medium">{item.name}</span>
              </Link>
            )
          })}
        </nav>

        <div className="mt-6 px-6 space-y-6 text-sm text-gray-600">
          <section>
            <h2 className="flex items-center gap-2 font-semibold text-gray-900 mb-2">
              <Info className="h-4 w-4" />
              About
            </h2>
            <p className="mb-2">This system detects common solar panel faults:</p>
            <ul className="list-disc pl-5 space-y-0.5">
              {detectableFaults.map((fault) => (
                <li key={fault}>{fault}</li>
              ))}
            </ul>
          </section>

          <section>
            <h2 className="flex items-center gap-2 font-semibold text-gray-900 mb-2">
              <MapPin className="h-4 w-4" />
              Service Office Locator
            </h2>
            <p>Enter your pincode to find the nearest service office, get its contact information and send a fault report.</p>
          </section>

          <p className="pt-4 border-t text-xs text-gray-500">
            <strong>Note:</strong> This is a demonstration system. For production use, train with your specific dataset.
          </p>

          {report && (
            <button
              type="button"
              onClick={() => downloadTextFile(report.text, report.fileName)}
              className="w-full flex items-center justify-center gap-2 py-2 px-4 bg-primary-600 text-white rounded-lg font-medium hover:bg-primary-700 transition-colors"
            >
              <Download className="h-4 w-4" />
              Download Fault Report
            </button>
          )}
        </div>
      </div>

      {/* Main content */}
      <div className="pl-72">
        <header className="bg-white shadow-sm">
          <div className="px-6 py-4">
            <h1 className="text-2xl font-semibold text-gray-900">
              Solar Panel Fault Detection
            </h1>
            <p className="text-sm text-gray-500 mt-1">
              Upload an EL (electroluminescence) image of a solar panel to detect faults and get repair instructions.
            </p>
          </div>
        </header>

        <main className="p-6">{children}</main>
      </div>
    </div>
  )
}
