import { describe, it, expect } from 'vitest'
import {
  buildMailtoLink,
  buildReport,
  buildTelLink,
  formatConfidence,
  renderReportText,
  reportFileName,
  type ReportInput,
} from '../report'
import { getFaultInfo } from '../faultInfo'
import { toPrediction } from '../../model/probabilities'
import type { ServiceOffice } from '../../types'

const office: ServiceOffice = {
  name: 'Test Service Office',
  email: 'office@test.example',
  phone: '+91-11-4000-1000',
  address: '1 Test Road, Testville 110001',
  workingHours: 'Mon-Fri, 9:00 AM - 5:00 PM',
}

// Microcracks at 0.873
const prediction = toPrediction([0.02, 0.873, 0.02, 0.02, 0.02, 0.017, 0.015, 0.015])

const baseInput: ReportInput = {
  prediction,
  faultInfo: getFaultInfo(prediction.label),
  contact: {
    name: 'Test User',
    phone: '+91-98765-00000',
    email: 'user@test.example',
    panelLocation: 'Rooftop, Block B',
    notes: 'Output dropped last week',
  },
  postalCode: '110001',
  office,
  now: new Date(2024, 2, 5, 14, 7, 9),
}

describe('report', () => {
  describe('formatConfidence', () => {
    it('should render a percentage with one decimal place', () => {
      expect(formatConfidence(0.873)).toBe('87.3%')
      expect(formatConfidence(1)).toBe('100.0%')
      expect(formatConfidence(0.12345)).toBe('12.3%')
    })
  })

  describe('buildTelLink', () => {
    it('should strip dashes, plus signs and spaces', () => {
      expect(buildTelLink('+91-11-4000-1000')).toBe('tel:911140001000')
      expect(buildTelLink('+91 80 4560 7700')).toBe('tel:918045607700')
    })
  })

  describe('reportFileName', () => {
    it('should embed the local timestamp', () => {
      expect(reportFileName(new Date(2024, 2, 5, 14, 7, 9))).toBe('fault_report_20240305_140709.txt')
    })
  })

  describe('buildReport', () => {
    it('should assemble the structured report', () => {
      const result = buildReport(baseInput)
      if (!result.ok) throw new Error('expected a report')

      expect(result.value.report).toEqual({
        timestamp: '2024-03-05 14:07:09',
        userDetails: {
          name: 'Test User',
          phone: '+91-98765-00000',
          email: 'user@test.example',
          pincode: '110001',
          panelLocation: 'Rooftop, Block B',
        },
        faultDetection: {
          faultType: 'Microcracks',
          confidence: '87.3%',
          severity: 'Medium',
          description: getFaultInfo('Microcracks').description,
        },
        officeDetails: {
          officeName: 'Test Service Office',
          email: 'office@test.example',
          phone: '+91-11-4000-1000',
          address: '1 Test Road, Testville 110001',
          workingHours: 'Mon-Fri, 9:00 AM - 5:00 PM',
        },
        additionalNotes: 'Output dropped last week',
      })
      expect(result.value.fileName).toBe('fault_report_20240305_140709.txt')
      expect(result.value.telLink).toBe('tel:911140001000')
    })

    it('should render the label, confidence and office contact in the text', () => {
      const result = buildReport(baseInput)
      if (!result.ok) throw new Error('expected a report')
      const lines = result.value.text.split('\n')

      expect(lines[0]).toBe('FAULT DETECTION REPORT')
      expect(lines).toContain('- Type: Microcracks')
      expect(lines).toContain('- Confidence: 87.3%')
      expect(lines).toContain('- Phone: +91-11-4000-1000')
      expect(lines).toContain('- Email: office@test.example')
      expect(lines).toContain('Pincode: 110001')
      expect(result.value.text).toBe(renderReportText(result.value.report))
    })

    it('should trim contact fields and default the optional ones', () => {
      const result = buildReport({
        ...baseInput,
        contact: { name: '  Test User ', phone: ' 12345 ', email: 'user@test.example' },
      })
      if (!result.ok) throw new Error('expected a report')

      expect(result.value.report.userDetails.name).toBe('Test User')
      expect(result.value.report.userDetails.phone).toBe('12345')
      expect(result.value.report.userDetails.panelLocation).toBe('')
      expect(result.value.report.additionalNotes).toBe('')
    })

    it('should fail validation on an empty name and produce no report', () => {
      const result = buildReport({ ...baseInput, contact: { ...baseInput.contact, name: '   ' } })

      expect(result).toEqual({ ok: false, errors: { name: 'Name is required' } })
    })

    it('should report every missing required field', () => {
      const result = buildReport({ ...baseInput, contact: { name: '', phone: '', email: '' } })

      expect(result).toEqual({
        ok: false,
        errors: {
          name: 'Name is required',
          phone: 'Phone number is required',
          email: 'Email address is required',
        },
      })
    })

    it('should use the same description for the same label regardless of confidence', () => {
      const other = toPrediction([0.1, 0.3, 0.1, 0.1, 0.1, 0.1, 0.1, 0.1])
      const first = buildReport(baseInput)
      const second = buildReport({ ...baseInput, prediction: other, faultInfo: getFaultInfo(other.label) })
      if (!first.ok || !second.ok) throw new Error('expected reports')

      expect(second.value.report.faultDetection.faultType).toBe('Microcracks')
      expect(second.value.report.faultDetection.description).toBe(first.value.report.faultDetection.description)
      expect(second.value.report.faultDetection.confidence).toBe('30.0%')
    })

    it('should mark severity as unknown when the fault has none', () => {
      const healthy = toPrediction([0.9, 0.02, 0.02, 0.02, 0.01, 0.01, 0.01, 0.01])
      const result = buildReport({ ...baseInput, prediction: healthy, faultInfo: getFaultInfo(healthy.label) })
      if (!result.ok) throw new Error('expected a report')

      expect(result.value.report.faultDetection.severity).toBe('Unknown')
    })
  })

  describe('buildMailtoLink', () => {
    it('should address the office with an encoded subject and body', () => {
      const result = buildReport(baseInput)
      if (!result.ok) throw new Error('expected a report')
      const link = buildMailtoLink(result.value.report)

      expect(link.startsWith('mailto:office@test.example?subject=Fault%20Report%20-%20Microcracks&body=')).toBe(true)
      const body = decodeURIComponent(link.slice(link.indexOf('&body=') + '&body='.length))
      expect(body.split('\n')[0]).toBe('Dear Test Service Office,')
      expect(body).toContain('- Confidence: 87.3%')
      expect(result.value.mailtoLink).toBe(link)
    })
  })
})
