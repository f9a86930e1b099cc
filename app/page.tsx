import BibliographyForm from '@/components/bibliography/BibliographyForm'

export default function HomePage() {
  return (
    <main className="mx-auto max-w-3xl px-4 py-12">
      <header className="mb-8 space-y-2">
        <h1 className="text-2xl font-semibold">Bibliography Builder</h1>
        <p className="text-sm text-muted-foreground">
          Collect papers from Semantic Scholar for a set of queries and download them as one JSON file.
        </p>
      </header>
      <BibliographyForm />
    </main>
  )
}
